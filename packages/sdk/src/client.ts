/**
 * @quorumkit/sdk: Multisig Client.
 *
 * Typed access to a quorumkit node: read the module, fetch the digest to
 * sign, and submit signed actions. bigints go over the wire as decimal
 * strings; signatures must already be in ascending signer order.
 */

import { HttpClient } from "./http-client.js";
import {
  EventPageSchema,
  MultisigStateSchema,
  RecordedEventSchema,
  SignerStatusSchema,
  SigningRequestSchema,
  type EventPage,
  type Hex,
  type MultisigEvent,
  type MultisigState,
  type RecordedEvent,
  type SignerStatus,
  type SigningRequest,
} from "./schemas.js";
import type { QuorumkitClientConfig, RequestOptions } from "./types.js";

// =============================================================================
// Parameter Types
// =============================================================================

export interface SignatureParams {
  readonly v: number;
  readonly r: Hex;
  readonly s: Hex;
}

export type ActionParams =
  | { readonly kind: "execute"; readonly target: Hex; readonly value: bigint; readonly payload: Hex }
  | { readonly kind: "update_quorum"; readonly quorum: number }
  | { readonly kind: "update_signer"; readonly signer: Hex; readonly trusted: boolean };

export interface ExecuteParams {
  readonly target: Hex;
  readonly value: bigint;
  readonly payload: Hex;
  readonly signatures: readonly SignatureParams[];
}

export interface ListEventsParams {
  readonly cursor?: string | undefined;
  readonly limit?: number | undefined;
  readonly type?: MultisigEvent["type"] | undefined;
}

const BASE = "/api/v1/multisig";

// =============================================================================
// Client
// =============================================================================

export class MultisigClient {
  private readonly http: HttpClient;

  constructor(config: QuorumkitClientConfig) {
    this.http = new HttpClient(config);
  }

  async state(): Promise<MultisigState> {
    return (await this.http.get(BASE, MultisigStateSchema)).data;
  }

  async signer(address: Hex): Promise<SignerStatus> {
    return (await this.http.get(`${BASE}/signers/${address}`, SignerStatusSchema)).data;
  }

  async isSigner(address: Hex): Promise<boolean> {
    return (await this.signer(address)).trusted;
  }

  /**
   * The digest signers must sign for `action` to be accepted next.
   * Stale as soon as any other action is applied.
   */
  async digest(action: ActionParams): Promise<SigningRequest> {
    const body = action.kind === "execute" ? { ...action, value: action.value.toString() } : action;
    return (await this.http.post(`${BASE}/digest`, body, SigningRequestSchema)).data;
  }

  async execute(params: ExecuteParams, options?: RequestOptions): Promise<RecordedEvent> {
    const body = { ...params, value: params.value.toString() };
    return (await this.http.post(`${BASE}/execute`, body, RecordedEventSchema, options)).data;
  }

  async setQuorum(
    quorum: number,
    signatures: readonly SignatureParams[],
    options?: RequestOptions,
  ): Promise<RecordedEvent> {
    return (
      await this.http.post(`${BASE}/quorum`, { quorum, signatures }, RecordedEventSchema, options)
    ).data;
  }

  async setSigner(
    signer: Hex,
    trusted: boolean,
    signatures: readonly SignatureParams[],
    options?: RequestOptions,
  ): Promise<RecordedEvent> {
    return (
      await this.http.post(
        `${BASE}/signers`,
        { signer, trusted, signatures },
        RecordedEventSchema,
        options,
      )
    ).data;
  }

  async events(params: ListEventsParams = {}): Promise<EventPage> {
    const query = new URLSearchParams();
    if (params.cursor !== undefined) query.set("cursor", params.cursor);
    if (params.limit !== undefined) query.set("limit", String(params.limit));
    if (params.type !== undefined) query.set("type", params.type);

    const search = query.toString();
    const suffix = search === "" ? "" : `?${search}`;
    return (await this.http.get(`${BASE}/events${suffix}`, EventPageSchema, { unwrap: false })).data;
  }
}
