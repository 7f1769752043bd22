/**
 * Quorum Policy
 *
 * Minimum number of valid signatures per action. Nothing ties it to the
 * size of the trusted set: a quorum above the number of trusted signers
 * locks the module permanently.
 */

export class QuorumPolicy {
  private required: number;

  constructor(initial: number) {
    assertQuorum(initial);
    this.required = initial;
  }

  get(): number {
    return this.required;
  }

  set(quorum: number): void {
    assertQuorum(quorum);
    this.required = quorum;
  }
}

export function isValidQuorum(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

function assertQuorum(value: number): void {
  if (!isValidQuorum(value)) {
    throw new RangeError(`Quorum must be a non-negative integer, got ${value}`);
  }
}
