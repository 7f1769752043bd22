/**
 * Signature Verifier
 *
 * Checks exactly `quorum` signatures against a digest. Recovered signers
 * must be trusted and strictly ascending by numeric address; the ordering
 * rule is the only duplicate check, so submitters must sort signatures by
 * recovered address before calling any entrypoint.
 *
 * Entries past index `quorum - 1` are never looked at.
 */

import { hexToBigInt, type Address, type Hex } from "viem";
import type { SignatureRecoverer } from "./recovery.js";
import type { SignerRegistry } from "./signer-registry.js";
import { MultisigError, type Signature } from "./types.js";

export class SignatureVerifier {
  constructor(
    private readonly registry: SignerRegistry,
    private readonly recoverer: SignatureRecoverer,
  ) {}

  /**
   * @returns The recovered signers, in submission order
   * @throws MultisigError SIGNATURE_INDEX_OUT_OF_RANGE if fewer than `quorum` signatures
   * @throws MultisigError INVALID_SIGNATURES on an unrecoverable, untrusted or out-of-order signer
   */
  async verify(
    digest: Hex,
    signatures: readonly Signature[],
    quorum: number,
  ): Promise<readonly Address[]> {
    const recovered: Address[] = [];
    let previous = 0n;

    for (let i = 0; i < quorum; i++) {
      const signature = signatures[i];
      if (signature === undefined) {
        throw new MultisigError(
          "SIGNATURE_INDEX_OUT_OF_RANGE",
          `Signature index ${i} out of range: ${signatures.length} supplied, quorum is ${quorum}`,
        );
      }

      const signer = await this.recoverSigner(digest, signature, i);
      const position = hexToBigInt(signer);

      if (!this.registry.isTrusted(signer) || position <= previous) {
        throw new MultisigError("INVALID_SIGNATURES", "Invalid signatures");
      }

      previous = position;
      recovered.push(signer);
    }

    return recovered;
  }

  private async recoverSigner(
    digest: Hex,
    signature: Signature,
    index: number,
  ): Promise<Address> {
    try {
      return await this.recoverer.recover(digest, signature);
    } catch (cause) {
      throw new MultisigError(
        "INVALID_SIGNATURES",
        `Invalid signatures: signature ${index} is not recoverable`,
        { cause },
      );
    }
  }
}
