/**
 * Signer Registry
 *
 * Membership set of trusted identities. Supports a membership test and
 * a trust toggle, nothing else: who is trusted right now can only be
 * reconstructed by replaying signer_updated events (see history.ts).
 */

import { getAddress, type Address } from "viem";

export class SignerRegistry {
  private readonly trusted = new Set<Address>();

  constructor(initial: readonly Address[] = []) {
    for (const address of initial) {
      this.setTrust(address, true);
    }
  }

  /**
   * Whether the address is currently trusted. Case-insensitive.
   */
  isTrusted(address: Address): boolean {
    return this.trusted.has(getAddress(address));
  }

  setTrust(address: Address, trusted: boolean): void {
    const normalized = getAddress(address);
    if (trusted) {
      this.trusted.add(normalized);
    } else {
      this.trusted.delete(normalized);
    }
  }

  /** @internal rollback only */
  snapshot(): ReadonlySet<Address> {
    return new Set(this.trusted);
  }

  /** @internal rollback only */
  restore(snapshot: ReadonlySet<Address>): void {
    this.trusted.clear();
    for (const address of snapshot) {
      this.trusted.add(address);
    }
  }
}
