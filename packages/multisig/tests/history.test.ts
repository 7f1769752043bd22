/**
 * Tests for the governance projection.
 */

import { describe, it, expect } from "vitest";
import type { Address } from "viem";
import { projectGovernance, replayToNonce } from "../src/history.js";
import type { RecordedEvent } from "../src/types.js";
import { approve, executeAction, makeModule, testAccount, TARGET } from "./helpers/signers.js";

describe("projectGovernance", () => {
  it("projects an empty history", () => {
    expect(projectGovernance([])).toEqual({
      trustedSigners: [],
      quorum: 0,
      executions: [],
      nextNonce: 1n,
    });
  });

  it("reconstructs the genesis configuration", () => {
    const { multisig, signers } = makeModule(3, 2);

    expect(projectGovernance(multisig.getEventHistory())).toEqual({
      trustedSigners: signers.map((s) => s.address),
      quorum: 2,
      executions: [],
      nextNonce: multisig.nonce(),
    });
  });

  it("follows signer, quorum and execution events", async () => {
    const { multisig, signers } = makeModule(3, 2);
    const removed = signers[0]!;

    await multisig.setSigner(
      removed.address,
      false,
      await approve(multisig, signers, { kind: "update_signer", signer: removed.address, trusted: false }),
    );
    await multisig.setQuorum(
      1,
      await approve(multisig, signers.slice(1), { kind: "update_quorum", quorum: 1 }),
    );
    await multisig.execute(
      TARGET,
      4n,
      "0x",
      await approve(multisig, signers.slice(1, 2), executeAction(4n)),
    );

    const projection = projectGovernance(multisig.getEventHistory());
    expect(projection).toEqual({
      trustedSigners: signers.slice(1).map((s) => s.address),
      quorum: 1,
      executions: [{ type: "executed", target: TARGET, value: 4n, payload: "0x" }],
      nextNonce: 4n,
    });
    expect(projection.nextNonce).toBe(multisig.nonce());
  });

  it("sorts trusted signers ascending", () => {
    const a = testAccount("history-a").address;
    const b = testAccount("history-b").address;
    const [low, high]: [Address, Address] = BigInt(a) < BigInt(b) ? [a, b] : [b, a];
    const events: RecordedEvent[] = [
      { event: { type: "signer_updated", signer: high, trusted: true }, nonce: 0n, sequence: 1 },
      { event: { type: "signer_updated", signer: low, trusted: true }, nonce: 0n, sequence: 2 },
    ];

    expect(projectGovernance(events).trustedSigners).toEqual([low, high]);
  });
});

describe("replayToNonce", () => {
  it("shows the state an action at that nonce was signed against", async () => {
    const { multisig, signers } = makeModule(3, 2);
    await multisig.setQuorum(
      3,
      await approve(multisig, signers, { kind: "update_quorum", quorum: 3 }),
    );
    await multisig.execute(TARGET, 0n, "0x", await approve(multisig, signers, executeAction()));
    const history = multisig.getEventHistory();

    expect(replayToNonce(history, 1n)).toMatchObject({ quorum: 2, nextNonce: 1n });
    expect(replayToNonce(history, 2n)).toMatchObject({ quorum: 3, nextNonce: 2n, executions: [] });
    expect(replayToNonce(history, 3n).executions).toHaveLength(1);
  });
});
