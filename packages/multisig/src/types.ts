/**
 * Multisig Types
 *
 * Actions, signatures, events and configuration for the
 * signature-gated authorization module.
 *
 * Design:
 * - All types are readonly
 * - Actions are ephemeral: they exist only long enough to build a digest
 * - Events are the only observable record of an applied action
 */

import type { Address, Hex } from "viem";

// =============================================================================
// Signatures
// =============================================================================

/**
 * One signer's approval of one digest, in (v, r, s) form.
 */
export interface Signature {
  /** Recovery id: 27 or 28 (0 and 1 are accepted as aliases) */
  readonly v: number;

  /** 32-byte r component */
  readonly r: Hex;

  /** 32-byte s component */
  readonly s: Hex;
}

// =============================================================================
// Actions
// =============================================================================

/**
 * Discriminated union of everything a quorum can authorize.
 */
export type Action = ExecuteAction | UpdateQuorumAction | UpdateSignerAction;

export type ActionKind = Action["kind"];

export interface ExecuteAction {
  readonly kind: "execute";
  readonly target: Address;
  /** Native value forwarded with the call, in wei */
  readonly value: bigint;
  readonly payload: Hex;
}

export interface UpdateQuorumAction {
  readonly kind: "update_quorum";
  readonly quorum: number;
}

export interface UpdateSignerAction {
  readonly kind: "update_signer";
  readonly signer: Address;
  readonly trusted: boolean;
}

// =============================================================================
// Events
// =============================================================================

export type MultisigEvent = ExecutedEvent | QuorumUpdatedEvent | SignerUpdatedEvent;

export interface ExecutedEvent {
  readonly type: "executed";
  readonly target: Address;
  readonly value: bigint;
  readonly payload: Hex;
}

export interface QuorumUpdatedEvent {
  readonly type: "quorum_updated";
  readonly quorum: number;
}

export interface SignerUpdatedEvent {
  readonly type: "signer_updated";
  readonly signer: Address;
  readonly trusted: boolean;
}

/**
 * An event as recorded in the module's history.
 */
export interface RecordedEvent {
  /** The emitted event */
  readonly event: MultisigEvent;

  /** Nonce that was current when the emitting action was submitted (0n for genesis) */
  readonly nonce: bigint;

  /** Position in the module's history (1-based) */
  readonly sequence: number;
}

export type MultisigEventHandler = (recorded: RecordedEvent) => void;

/**
 * A subscription that can be unsubscribed.
 */
export interface Subscription {
  unsubscribe(): void;
}

// =============================================================================
// Configuration
// =============================================================================

/**
 * EIP-712 domain the module binds its digests to.
 */
export interface MultisigDomain {
  readonly name: string;
  readonly chainId: number;
  /** The module's own address */
  readonly verifyingContract: Address;
}

export interface MultisigConfig extends MultisigDomain {
  /** Identities trusted at construction */
  readonly signers: readonly Address[];

  /** Minimum number of valid signatures per action */
  readonly quorum: number;
}

// =============================================================================
// Errors
// =============================================================================

export type MultisigErrorCode =
  | "INVALID_SIGNATURES"
  | "EXECUTION_FAILED"
  | "SIGNATURE_INDEX_OUT_OF_RANGE"
  | "INVALID_CONFIG"
  | "INVALID_ARGUMENT";

/**
 * Error thrown by Multisig operations.
 *
 * Any MultisigError thrown from an entrypoint means the action had no effect.
 */
export class MultisigError extends Error {
  constructor(
    public readonly code: MultisigErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "MultisigError";
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isExecutedEvent(e: MultisigEvent): e is ExecutedEvent {
  return e.type === "executed";
}

export function isQuorumUpdatedEvent(e: MultisigEvent): e is QuorumUpdatedEvent {
  return e.type === "quorum_updated";
}

export function isSignerUpdatedEvent(e: MultisigEvent): e is SignerUpdatedEvent {
  return e.type === "signer_updated";
}

export function isMultisigError(err: unknown): err is MultisigError {
  return err instanceof MultisigError;
}
