/**
 * Event History Projection
 *
 * The registry cannot list its members. Callers that need the trusted set
 * rebuild it by replaying recorded events, genesis included, in order.
 *
 * Deterministic: same events → same projection.
 */

import { getAddress, type Address } from "viem";
import type { ExecutedEvent, RecordedEvent } from "./types.js";

export interface GovernanceProjection {
  /** Trusted signers, ascending by address */
  readonly trustedSigners: readonly Address[];

  readonly quorum: number;

  /** Executed calls in order */
  readonly executions: readonly ExecutedEvent[];

  /** Nonce the next action would be signed against */
  readonly nextNonce: bigint;
}

/**
 * Replay a full event history.
 */
export function projectGovernance(events: readonly RecordedEvent[]): GovernanceProjection {
  const trusted = new Set<Address>();
  const executions: ExecutedEvent[] = [];
  let quorum = 0;
  let lastNonce = 0n;

  for (const { event, nonce } of events) {
    switch (event.type) {
      case "signer_updated": {
        const signer = getAddress(event.signer);
        if (event.trusted) {
          trusted.add(signer);
        } else {
          trusted.delete(signer);
        }
        break;
      }
      case "quorum_updated":
        quorum = event.quorum;
        break;
      case "executed":
        executions.push(event);
        break;
    }
    if (nonce > lastNonce) {
      lastNonce = nonce;
    }
  }

  return {
    trustedSigners: [...trusted].sort(compareAddresses),
    quorum,
    executions,
    nextNonce: lastNonce + 1n,
  };
}

/**
 * Projection as it stood when `nonce` was the current nonce, i.e. before
 * the action signed against `nonce` was applied.
 */
export function replayToNonce(
  events: readonly RecordedEvent[],
  nonce: bigint,
): GovernanceProjection {
  return projectGovernance(events.filter((e) => e.nonce < nonce));
}

function compareAddresses(a: Address, b: Address): number {
  const x = BigInt(a);
  const y = BigInt(b);
  return x < y ? -1 : x > y ? 1 : 0;
}
