/**
 * Multisig State
 *
 * The single owned aggregate every entrypoint mutates: registry, quorum
 * and nonce. Entrypoints run inside `transact`, which snapshots the
 * aggregate first and restores it if the operation throws.
 */

import type { Address } from "viem";
import { NonceSequencer } from "./nonce.js";
import { QuorumPolicy } from "./quorum.js";
import { SignerRegistry } from "./signer-registry.js";

export interface StateSnapshot {
  readonly signers: ReadonlySet<Address>;
  readonly quorum: number;
  readonly nonce: bigint;
}

export class MultisigState {
  readonly signers: SignerRegistry;
  readonly quorum: QuorumPolicy;
  readonly nonce: NonceSequencer;

  constructor(signers: readonly Address[], quorum: number) {
    this.signers = new SignerRegistry(signers);
    this.quorum = new QuorumPolicy(quorum);
    this.nonce = new NonceSequencer();
  }

  snapshot(): StateSnapshot {
    return {
      signers: this.signers.snapshot(),
      quorum: this.quorum.get(),
      nonce: this.nonce.current(),
    };
  }

  restore(snapshot: StateSnapshot): void {
    this.signers.restore(snapshot.signers);
    this.quorum.set(snapshot.quorum);
    this.nonce.restore(snapshot.nonce);
  }

  /**
   * Run `operation` against this state; on throw, roll every field back
   * and rethrow.
   */
  async transact<T>(operation: () => Promise<T>): Promise<T> {
    const before = this.snapshot();
    try {
      return await operation();
    } catch (error) {
      this.restore(before);
      throw error;
    }
  }
}
