/**
 * @quorumkit/sdk: Typed HTTP client for a quorumkit node.
 *
 * @packageDocumentation
 */

// Types
export type {
  QuorumkitClientConfig,
  QuorumkitResponse,
  RequestOptions,
} from "./types.js";
export { QuorumkitError } from "./types.js";

// HTTP Client
export { HttpClient } from "./http-client.js";

// Client
export { MultisigClient } from "./client.js";
export type {
  ActionParams,
  ExecuteParams,
  ListEventsParams,
  SignatureParams,
} from "./client.js";

// Response shapes
export {
  MultisigStateSchema,
  SignerStatusSchema,
  SigningRequestSchema,
  RecordedEventSchema,
  EventPageSchema,
  ErrorEnvelopeSchema,
} from "./schemas.js";
export type {
  Hex,
  MultisigState,
  SignerStatus,
  ActionView,
  SigningRequest,
  MultisigEvent,
  RecordedEvent,
  EventPage,
} from "./schemas.js";
