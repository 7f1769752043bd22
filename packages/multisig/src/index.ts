/**
 * @quorumkit/multisig: Signature-gated authorization module.
 *
 * A set of trusted signers approves actions off-platform by signing an
 * EIP-712 digest; the module verifies exactly `quorum` signatures,
 * strictly ascending by recovered address, before the action applies.
 *
 * Actions:
 * 1. execute: forward (target, value, payload) to an external collaborator
 * 2. setQuorum: change the required signature count
 * 3. setSigner: trust or distrust an identity
 *
 * One global nonce binds every digest, so a signature set is usable once.
 */

// Module
export { Multisig } from "./multisig.js";
export type { MultisigDeps, HandlerErrorReporter } from "./multisig.js";

// Components
export {
  buildDigest,
  actionDigest,
  computeDomainSeparator,
  encodeActionFields,
  typeHashOf,
  ACTION_TYPES,
  EIP712_DOMAIN_TYPE,
  EIP712_DOMAIN_TYPEHASH,
} from "./digest.js";
export { NonceSequencer, INITIAL_NONCE } from "./nonce.js";
export { QuorumPolicy, isValidQuorum } from "./quorum.js";
export { SignerRegistry } from "./signer-registry.js";
export { MultisigState } from "./state.js";
export type { StateSnapshot } from "./state.js";
export { SignatureVerifier } from "./verifier.js";
export { secp256k1Recoverer, normalizeV } from "./recovery.js";
export type { SignatureRecoverer } from "./recovery.js";

// Executors
export { DispatchExecutor } from "./executor.js";
export type { CallExecutor, CallHandler, ExternalCall } from "./executor.js";
export { RpcCallExecutor, supportedChainIds } from "./rpc-executor.js";
export type { RpcExecutorConfig } from "./rpc-executor.js";

// Signing kit
export {
  createSigningRequest,
  signRequest,
  sortSignatures,
  collectSignatures,
  toSignature,
} from "./signing.js";
export type { DigestSigner, SigningRequest } from "./signing.js";

// History
export { projectGovernance, replayToNonce } from "./history.js";
export type { GovernanceProjection } from "./history.js";

// Types
export type {
  Action,
  ActionKind,
  ExecuteAction,
  UpdateQuorumAction,
  UpdateSignerAction,
  Signature,
  MultisigEvent,
  ExecutedEvent,
  QuorumUpdatedEvent,
  SignerUpdatedEvent,
  RecordedEvent,
  MultisigEventHandler,
  Subscription,
  MultisigDomain,
  MultisigConfig,
  MultisigErrorCode,
} from "./types.js";
export {
  MultisigError,
  isExecutedEvent,
  isQuorumUpdatedEvent,
  isSignerUpdatedEvent,
  isMultisigError,
} from "./types.js";
