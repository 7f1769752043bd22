/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Each request DTO has a Zod schema and a derived TypeScript type.
 * Response DTOs carry bigints as decimal strings.
 */

import { getAddress, isAddress, isHex, maxUint256, type Address, type Hex } from "viem";
import { z } from "zod";
import type {
  Action,
  MultisigEvent,
  RecordedEvent,
  SigningRequest,
} from "@quorumkit/multisig";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AddressSchema = z
  .custom<Address>((v) => typeof v === "string" && isAddress(v, { strict: false }), {
    message: "Expected a 20-byte hex address",
  })
  .transform((v) => getAddress(v));

export const BytesSchema = z.custom<Hex>(
  (v) => typeof v === "string" && isHex(v, { strict: true }) && v.length % 2 === 0,
  { message: "Expected an even-length 0x-prefixed hex string" },
);

const Bytes32Schema = z.custom<Hex>(
  (v) => typeof v === "string" && isHex(v, { strict: true }) && v.length === 66,
  { message: "Expected a 32-byte hex string" },
);

/** uint256 carried as a decimal string. */
export const UintStringSchema = z
  .string()
  .regex(/^\d+$/, "Expected a non-negative decimal integer")
  .transform((v, ctx) => {
    const value = BigInt(v);
    if (value > maxUint256) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Expected a value that fits in uint256" });
      return z.NEVER;
    }
    return value;
  });

export const SignatureSchema = z.object({
  v: z.number().int().min(0).max(255),
  r: Bytes32Schema,
  s: Bytes32Schema,
});

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Action DTOs
// =============================================================================

export const ActionSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("execute"),
    target: AddressSchema,
    value: UintStringSchema,
    payload: BytesSchema,
  }),
  z.object({
    kind: z.literal("update_quorum"),
    quorum: z.number().int().min(0),
  }),
  z.object({
    kind: z.literal("update_signer"),
    signer: AddressSchema,
    trusted: z.boolean(),
  }),
]);

export type ActionBody = z.infer<typeof ActionSchema>;

export const ExecuteSchema = z.object({
  target: AddressSchema,
  value: UintStringSchema,
  payload: BytesSchema,
  signatures: z.array(SignatureSchema),
});

export type ExecuteBody = z.infer<typeof ExecuteSchema>;

export const SetQuorumSchema = z.object({
  quorum: z.number().int().min(0),
  signatures: z.array(SignatureSchema),
});

export type SetQuorumBody = z.infer<typeof SetQuorumSchema>;

export const SetSignerSchema = z.object({
  signer: AddressSchema,
  trusted: z.boolean(),
  signatures: z.array(SignatureSchema),
});

export type SetSignerBody = z.infer<typeof SetSignerSchema>;

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  type: z.enum(["executed", "quorum_updated", "signer_updated"]).optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

// =============================================================================
// Response DTOs
// =============================================================================

export interface MultisigStateDto {
  readonly name: string;
  readonly chainId: number;
  readonly verifyingContract: Address;
  readonly domainSeparator: Hex;
  readonly nonce: string;
  readonly quorum: number;
}

export interface SignerStatusDto {
  readonly address: Address;
  readonly trusted: boolean;
}

export type ActionDto =
  | { readonly kind: "execute"; readonly target: Address; readonly value: string; readonly payload: Hex }
  | { readonly kind: "update_quorum"; readonly quorum: number }
  | { readonly kind: "update_signer"; readonly signer: Address; readonly trusted: boolean };

export interface SigningRequestDto {
  readonly action: ActionDto;
  readonly nonce: string;
  readonly digest: Hex;
}

export type MultisigEventDto =
  | { readonly type: "executed"; readonly target: Address; readonly value: string; readonly payload: Hex }
  | { readonly type: "quorum_updated"; readonly quorum: number }
  | { readonly type: "signer_updated"; readonly signer: Address; readonly trusted: boolean };

export interface RecordedEventDto {
  readonly sequence: number;
  readonly nonce: string;
  readonly event: MultisigEventDto;
}

// =============================================================================
// Mapping
// =============================================================================

export function toActionDto(action: Action): ActionDto {
  switch (action.kind) {
    case "execute":
      return { ...action, value: action.value.toString() };
    case "update_quorum":
    case "update_signer":
      return action;
  }
}

export function toSigningRequestDto(request: SigningRequest): SigningRequestDto {
  return {
    action: toActionDto(request.action),
    nonce: request.nonce.toString(),
    digest: request.digest,
  };
}

export function toEventDto(event: MultisigEvent): MultisigEventDto {
  switch (event.type) {
    case "executed":
      return { ...event, value: event.value.toString() };
    case "quorum_updated":
    case "signer_updated":
      return event;
  }
}

export function toRecordedEventDto(recorded: RecordedEvent): RecordedEventDto {
  return {
    sequence: recorded.sequence,
    nonce: recorded.nonce.toString(),
    event: toEventDto(recorded.event),
  };
}
