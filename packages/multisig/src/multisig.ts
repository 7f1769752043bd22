/**
 * Multisig: signature-gated authorization module.
 *
 * A set of trusted signers collectively approves three kinds of action:
 * calling an external target, changing the quorum, and changing the
 * trusted set. Every entrypoint is one atomic transaction:
 *
 *   build digest at current nonce → verify quorum signatures → apply →
 *   advance nonce → emit
 *
 * The nonce advances only once the effect has applied, so readers never
 * see the nonce of an action still in flight. If any step throws, the
 * registry and quorum are restored and no event is recorded. Operations
 * on one instance are serialized, so two submissions signed against the
 * same nonce cannot both succeed: the second sees a digest built from the
 * advanced nonce and fails verification.
 */

import { getAddress, isAddress, isHex, maxUint256, type Address, type Hex } from "viem";
import { actionDigest, computeDomainSeparator } from "./digest.js";
import type { CallExecutor } from "./executor.js";
import { isValidQuorum } from "./quorum.js";
import { secp256k1Recoverer, type SignatureRecoverer } from "./recovery.js";
import { MultisigState } from "./state.js";
import { SignatureVerifier } from "./verifier.js";
import {
  MultisigError,
  type Action,
  type ExecuteAction,
  type MultisigConfig,
  type MultisigDomain,
  type MultisigEvent,
  type MultisigEventHandler,
  type RecordedEvent,
  type Signature,
  type Subscription,
} from "./types.js";

// =============================================================================
// Dependencies
// =============================================================================

export interface MultisigDeps {
  /** Capability that performs the external call behind `execute` */
  readonly executor: CallExecutor;

  /** Signature recovery; defaults to secp256k1 via viem */
  readonly recoverer?: SignatureRecoverer;

  /**
   * Receives errors thrown by subscribers. Without one, the error is
   * rethrown from a microtask, outside the submitter's promise.
   */
  readonly onHandlerError?: HandlerErrorReporter;
}

export type HandlerErrorReporter = (error: unknown, recorded: RecordedEvent) => void;

const rethrowLater: HandlerErrorReporter = (error) => {
  queueMicrotask(() => {
    throw error;
  });
};

const GENESIS_NONCE = 0n;

// =============================================================================
// Multisig
// =============================================================================

export class Multisig {
  private readonly state: MultisigState;
  private readonly verifier: SignatureVerifier;
  private readonly executor: CallExecutor;
  private readonly onHandlerError: HandlerErrorReporter;
  private readonly _domain: MultisigDomain;
  private readonly _domainSeparator: Hex;
  private readonly history: RecordedEvent[] = [];
  private readonly subscribers = new Set<MultisigEventHandler>();
  private queue: Promise<void> = Promise.resolve();

  /**
   * @throws MultisigError INVALID_CONFIG
   */
  constructor(config: MultisigConfig, deps: MultisigDeps) {
    validateConfig(config);

    this._domain = {
      name: config.name,
      chainId: config.chainId,
      verifyingContract: getAddress(config.verifyingContract),
    };
    this._domainSeparator = computeDomainSeparator(this._domain);
    this.state = new MultisigState(config.signers, config.quorum);
    this.verifier = new SignatureVerifier(
      this.state.signers,
      deps.recoverer ?? secp256k1Recoverer,
    );
    this.executor = deps.executor;
    this.onHandlerError = deps.onHandlerError ?? rethrowLater;

    const seen = new Set<Address>();
    for (const signer of config.signers) {
      const normalized = getAddress(signer);
      if (seen.has(normalized)) continue;
      seen.add(normalized);
      this.record({ type: "signer_updated", signer: normalized, trusted: true }, GENESIS_NONCE);
    }
    this.record({ type: "quorum_updated", quorum: config.quorum }, GENESIS_NONCE);
  }

  // ─── Read Accessors ─────────────────────────────────────────────────

  /** The nonce the next action must be signed against. */
  nonce(): bigint {
    return this.state.nonce.current();
  }

  quorum(): number {
    return this.state.quorum.get();
  }

  /**
   * @throws MultisigError INVALID_ARGUMENT if `address` is not an address
   */
  isSigner(address: string): boolean {
    return this.state.signers.isTrusted(parseAddress(address, "address"));
  }

  domainSeparator(): Hex {
    return this._domainSeparator;
  }

  domain(): MultisigDomain {
    return this._domain;
  }

  /**
   * Every recorded event, genesis included, in order.
   */
  getEventHistory(): readonly RecordedEvent[] {
    return [...this.history];
  }

  /**
   * Receive events as actions commit. Handlers run synchronously after
   * the state change is final. A throwing handler is reported to
   * `onHandlerError`; the remaining handlers still run and the submitter
   * still receives the recorded event.
   */
  subscribe(handler: MultisigEventHandler): Subscription {
    this.subscribers.add(handler);
    return {
      unsubscribe: () => {
        this.subscribers.delete(handler);
      },
    };
  }

  // ─── Entrypoints ────────────────────────────────────────────────────

  /**
   * Forward `value` and `payload` to `target` once a quorum has signed.
   *
   * @throws MultisigError INVALID_ARGUMENT | SIGNATURE_INDEX_OUT_OF_RANGE |
   *   INVALID_SIGNATURES | EXECUTION_FAILED
   */
  async execute(
    target: string,
    value: bigint,
    payload: string,
    signatures: readonly Signature[],
  ): Promise<RecordedEvent> {
    const action: ExecuteAction = {
      kind: "execute",
      target: parseAddress(target, "target"),
      value: parseValue(value),
      payload: parsePayload(payload),
    };

    return this.authorize(action, signatures, async () => {
      const call = { target: action.target, value: action.value, payload: action.payload };
      let ok: boolean;
      try {
        ok = await this.executor.invoke(call);
      } catch (cause) {
        throw new MultisigError(
          "EXECUTION_FAILED",
          `Execution failed: call to ${call.target} threw`,
          { cause },
        );
      }
      if (!ok) {
        throw new MultisigError(
          "EXECUTION_FAILED",
          `Execution failed: call to ${call.target} reported failure`,
        );
      }
      return { type: "executed", ...call };
    });
  }

  /**
   * Replace the quorum. The change must be signed by the current quorum.
   */
  async setQuorum(quorum: number, signatures: readonly Signature[]): Promise<RecordedEvent> {
    if (!isValidQuorum(quorum)) {
      throw new MultisigError(
        "INVALID_ARGUMENT",
        `quorum must be a non-negative integer, got ${quorum}`,
      );
    }

    return this.authorize({ kind: "update_quorum", quorum }, signatures, () => {
      this.state.quorum.set(quorum);
      return { type: "quorum_updated", quorum };
    });
  }

  /**
   * Trust or distrust a signer. The change must be signed by the current quorum.
   */
  async setSigner(
    signer: string,
    trusted: boolean,
    signatures: readonly Signature[],
  ): Promise<RecordedEvent> {
    const address = parseAddress(signer, "signer");

    return this.authorize({ kind: "update_signer", signer: address, trusted }, signatures, () => {
      this.state.signers.setTrust(address, trusted);
      return { type: "signer_updated", signer: address, trusted };
    });
  }

  // ===========================================================================
  // Private
  // ===========================================================================

  private authorize(
    action: Action,
    signatures: readonly Signature[],
    apply: () => MultisigEvent | Promise<MultisigEvent>,
  ): Promise<RecordedEvent> {
    return this.serialize(async () => {
      const { event, nonce } = await this.state.transact(async () => {
        const nonce = this.state.nonce.current();
        const digest = actionDigest(this._domainSeparator, action, nonce);
        await this.verifier.verify(digest, signatures, this.state.quorum.get());
        const applied = await apply();
        // Commit point: nothing after this can fail.
        this.state.nonce.next();
        return { event: applied, nonce };
      });
      return this.record(event, nonce);
    });
  }

  private serialize<T>(operation: () => Promise<T>): Promise<T> {
    const run = this.queue.then(operation);
    // The queue only orders operations; each caller observes its own outcome via `run`.
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private record(event: MultisigEvent, nonce: bigint): RecordedEvent {
    const recorded: RecordedEvent = {
      event,
      nonce,
      sequence: this.history.length + 1,
    };
    this.history.push(recorded);
    for (const handler of [...this.subscribers]) {
      try {
        handler(recorded);
      } catch (error) {
        this.onHandlerError(error, recorded);
      }
    }
    return recorded;
  }
}

// =============================================================================
// Validation
// =============================================================================

function validateConfig(config: MultisigConfig): void {
  if (config.name.length === 0) {
    throw new MultisigError("INVALID_CONFIG", "name cannot be empty");
  }
  if (!Number.isSafeInteger(config.chainId) || config.chainId < 1) {
    throw new MultisigError(
      "INVALID_CONFIG",
      `chainId must be a positive integer, got ${config.chainId}`,
    );
  }
  if (!isAddress(config.verifyingContract, { strict: false })) {
    throw new MultisigError(
      "INVALID_CONFIG",
      `verifyingContract is not an address: ${config.verifyingContract}`,
    );
  }
  for (const signer of config.signers) {
    if (!isAddress(signer, { strict: false })) {
      throw new MultisigError("INVALID_CONFIG", `signer is not an address: ${signer}`);
    }
  }
  if (!isValidQuorum(config.quorum)) {
    throw new MultisigError(
      "INVALID_CONFIG",
      `quorum must be a non-negative integer, got ${config.quorum}`,
    );
  }
}

function parseAddress(value: string, field: string): Address {
  if (!isAddress(value, { strict: false })) {
    throw new MultisigError("INVALID_ARGUMENT", `${field} is not an address: ${value}`);
  }
  return getAddress(value);
}

function parseValue(value: bigint): bigint {
  if (value < 0n || value > maxUint256) {
    throw new MultisigError("INVALID_ARGUMENT", `value out of uint256 range: ${value}`);
  }
  return value;
}

function parsePayload(payload: string): Hex {
  if (!isHex(payload, { strict: true }) || payload.length % 2 !== 0) {
    throw new MultisigError("INVALID_ARGUMENT", `payload is not a byte string: ${payload}`);
  }
  return payload;
}
