/**
 * Type barrel: re-exports all public types from @quorumkit/node.
 */

// DTOs
export {
  AddressSchema,
  BytesSchema,
  UintStringSchema,
  SignatureSchema,
  PaginationQuerySchema,
  ActionSchema,
  ExecuteSchema,
  SetQuorumSchema,
  SetSignerSchema,
  ListEventsQuerySchema,
  toActionDto,
  toEventDto,
  toRecordedEventDto,
  toSigningRequestDto,
} from "./dto.js";
export type {
  ActionBody,
  ExecuteBody,
  SetQuorumBody,
  SetSignerBody,
  ListEventsQuery,
  MultisigStateDto,
  SignerStatusDto,
  ActionDto,
  SigningRequestDto,
  MultisigEventDto,
  RecordedEventDto,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// App env
export type { AppEnv } from "./api-contract.js";
