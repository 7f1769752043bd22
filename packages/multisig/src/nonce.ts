/**
 * Nonce Sequencer
 *
 * One counter shared by every action kind. Digests are built over the
 * current value, which advances once the action commits.
 */

export const INITIAL_NONCE = 1n;

export class NonceSequencer {
  private value: bigint;

  constructor(initial: bigint = INITIAL_NONCE) {
    if (initial < 0n) {
      throw new RangeError(`Nonce must be >= 0, got ${initial}`);
    }
    this.value = initial;
  }

  /**
   * The nonce the next action must be signed against.
   */
  current(): bigint {
    return this.value;
  }

  /**
   * Return the current nonce and advance by exactly one.
   */
  next(): bigint {
    const used = this.value;
    this.value = used + 1n;
    return used;
  }

  /** @internal rollback only */
  restore(value: bigint): void {
    this.value = value;
  }
}
