/**
 * Response schemas. Every body the client returns is parsed against one
 * of these, so a node speaking a different shape fails loudly.
 */

import { z } from "zod";

export type Hex = `0x${string}`;

const HexSchema = z.custom<Hex>(
  (v) => typeof v === "string" && /^0x[0-9a-fA-F]*$/.test(v),
  { message: "Expected a 0x-prefixed hex string" },
);

const DecimalSchema = z.string().regex(/^\d+$/);

export const MultisigStateSchema = z.object({
  name: z.string(),
  chainId: z.number().int(),
  verifyingContract: HexSchema,
  domainSeparator: HexSchema,
  nonce: DecimalSchema,
  quorum: z.number().int(),
});

export type MultisigState = z.infer<typeof MultisigStateSchema>;

export const SignerStatusSchema = z.object({
  address: HexSchema,
  trusted: z.boolean(),
});

export type SignerStatus = z.infer<typeof SignerStatusSchema>;

const ActionSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("execute"), target: HexSchema, value: DecimalSchema, payload: HexSchema }),
  z.object({ kind: z.literal("update_quorum"), quorum: z.number().int() }),
  z.object({ kind: z.literal("update_signer"), signer: HexSchema, trusted: z.boolean() }),
]);

export type ActionView = z.infer<typeof ActionSchema>;

export const SigningRequestSchema = z.object({
  action: ActionSchema,
  nonce: DecimalSchema,
  digest: HexSchema,
});

export type SigningRequest = z.infer<typeof SigningRequestSchema>;

const EventSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("executed"), target: HexSchema, value: DecimalSchema, payload: HexSchema }),
  z.object({ type: z.literal("quorum_updated"), quorum: z.number().int() }),
  z.object({ type: z.literal("signer_updated"), signer: HexSchema, trusted: z.boolean() }),
]);

export type MultisigEvent = z.infer<typeof EventSchema>;

export const RecordedEventSchema = z.object({
  sequence: z.number().int(),
  nonce: DecimalSchema,
  event: EventSchema,
});

export type RecordedEvent = z.infer<typeof RecordedEventSchema>;

export const EventPageSchema = z.object({
  data: z.array(RecordedEventSchema),
  pagination: z.object({
    cursor: z.string().nullable(),
    hasMore: z.boolean(),
  }),
});

export type EventPage = z.infer<typeof EventPageSchema>;

export const ErrorEnvelopeSchema = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
    details: z.unknown().optional(),
  }),
});
