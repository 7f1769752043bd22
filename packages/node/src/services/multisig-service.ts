/**
 * MultisigService: composition root for the multisig module.
 *
 * Route handlers delegate to this service; they never touch the module
 * directly. The service converts between wire DTOs and domain values and
 * logs every submitted action with its outcome.
 */

import { pino, type Logger } from "pino";
import { getAddress, type Address, type Hex } from "viem";
import {
  Multisig,
  createSigningRequest,
  isMultisigError,
  type Action,
  type CallExecutor,
  type MultisigConfig,
  type RecordedEvent,
  type Signature,
} from "@quorumkit/multisig";
import {
  toRecordedEventDto,
  toSigningRequestDto,
  type MultisigStateDto,
  type RecordedEventDto,
  type SignerStatusDto,
  type SigningRequestDto,
} from "../types/dto.js";

// =============================================================================
// Configuration
// =============================================================================

export type MultisigServiceConfig = MultisigConfig;

export interface MultisigServiceDeps {
  readonly executor: CallExecutor;
  /** Defaults to a silent logger */
  readonly logger?: Logger | undefined;
}

// =============================================================================
// Service
// =============================================================================

export class MultisigService {
  readonly multisig: Multisig;
  private readonly logger: Logger;

  constructor(config: MultisigServiceConfig, deps: MultisigServiceDeps) {
    this.logger = deps.logger ?? pino({ level: "silent" });
    this.multisig = new Multisig(config, {
      executor: deps.executor,
      onHandlerError: (err, recorded) => {
        this.logger.error(
          { err, sequence: recorded.sequence, event: recorded.event.type },
          "Event subscriber failed",
        );
      },
    });
  }

  // ─── Queries ─────────────────────────────────────────────────────

  state(): MultisigStateDto {
    const domain = this.multisig.domain();
    return {
      name: domain.name,
      chainId: domain.chainId,
      verifyingContract: domain.verifyingContract,
      domainSeparator: this.multisig.domainSeparator(),
      nonce: this.multisig.nonce().toString(),
      quorum: this.multisig.quorum(),
    };
  }

  /**
   * @throws MultisigError INVALID_ARGUMENT for a malformed address
   */
  signer(address: string): SignerStatusDto {
    const trusted = this.multisig.isSigner(address);
    return { address: getAddress(address), trusted };
  }

  /**
   * The digest `action` must be signed over to be accepted next.
   */
  signingRequest(action: Action): SigningRequestDto {
    return toSigningRequestDto(
      createSigningRequest(this.multisig.domainSeparator(), action, this.multisig.nonce()),
    );
  }

  events(): readonly RecordedEventDto[] {
    return this.multisig.getEventHistory().map(toRecordedEventDto);
  }

  // ─── Actions ─────────────────────────────────────────────────────

  execute(
    target: Address,
    value: bigint,
    payload: Hex,
    signatures: readonly Signature[],
  ): Promise<RecordedEventDto> {
    return this.submit("execute", () =>
      this.multisig.execute(target, value, payload, signatures),
    );
  }

  setQuorum(quorum: number, signatures: readonly Signature[]): Promise<RecordedEventDto> {
    return this.submit("update_quorum", () => this.multisig.setQuorum(quorum, signatures));
  }

  setSigner(
    signer: Address,
    trusted: boolean,
    signatures: readonly Signature[],
  ): Promise<RecordedEventDto> {
    return this.submit("update_signer", () =>
      this.multisig.setSigner(signer, trusted, signatures),
    );
  }

  // ─── Private ─────────────────────────────────────────────────────

  private async submit(
    kind: Action["kind"],
    operation: () => Promise<RecordedEvent>,
  ): Promise<RecordedEventDto> {
    let recorded: RecordedEvent;
    try {
      recorded = await operation();
    } catch (error) {
      this.logger.warn(
        {
          action: kind,
          code: isMultisigError(error) ? error.code : "INTERNAL_ERROR",
          nonce: this.multisig.nonce().toString(),
        },
        "Action rejected",
      );
      throw error;
    }

    const dto = toRecordedEventDto(recorded);
    this.logger.info(
      { action: kind, event: dto.event, nonce: dto.nonce, nextNonce: this.multisig.nonce().toString() },
      "Action applied",
    );
    return dto;
  }
}
