/**
 * Tests for MultisigService logging and DTO mapping.
 */

import { describe, it, expect } from "vitest";
import { pino } from "pino";
import { DispatchExecutor, collectSignatures, createSigningRequest } from "@quorumkit/multisig";
import { MultisigService } from "../src/services/multisig-service.js";
import { makeSigners, MODULE_ADDRESS, TARGET } from "./setup.js";

interface LogLine {
  level: number;
  msg: string;
  [key: string]: unknown;
}

function capture() {
  const lines: LogLine[] = [];
  const logger = pino(
    { level: "info" },
    {
      write(chunk: string) {
        lines.push(JSON.parse(chunk) as LogLine);
      },
    },
  );
  return { lines, logger };
}

function makeService() {
  const signers = makeSigners(2);
  const { lines, logger } = capture();
  const service = new MultisigService(
    {
      name: "service-test",
      chainId: 1,
      verifyingContract: MODULE_ADDRESS,
      signers: signers.map((s) => s.address),
      quorum: 2,
    },
    { executor: new DispatchExecutor(), logger },
  );
  return { service, signers, lines };
}

describe("MultisigService", () => {
  it("logs applied actions with the event and nonces", async () => {
    const { service, signers, lines } = makeService();
    const signatures = await collectSignatures(
      signers,
      createSigningRequest(
        service.multisig.domainSeparator(),
        { kind: "execute", target: TARGET, value: 7n, payload: "0x" },
        1n,
      ),
    );

    const recorded = await service.execute(TARGET, 7n, "0x", signatures);

    expect(recorded).toEqual({
      sequence: 4,
      nonce: "1",
      event: { type: "executed", target: TARGET, value: "7", payload: "0x" },
    });
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 30,
      msg: "Action applied",
      action: "execute",
      nonce: "1",
      nextNonce: "2",
      event: { type: "executed", value: "7" },
    });
  });

  it("logs rejected actions at warn with the error code", async () => {
    const { service, lines } = makeService();

    await expect(service.setQuorum(1, [])).rejects.toMatchObject({
      code: "SIGNATURE_INDEX_OUT_OF_RANGE",
    });

    expect(lines).toEqual([
      expect.objectContaining({
        level: 40,
        msg: "Action rejected",
        action: "update_quorum",
        code: "SIGNATURE_INDEX_OUT_OF_RANGE",
        nonce: "1",
      }),
    ]);
  });

  it("logs a failing subscriber at error and still applies the action", async () => {
    const { service, signers, lines } = makeService();
    service.multisig.subscribe(() => {
      throw new Error("subscriber failed");
    });
    const signatures = await collectSignatures(
      signers,
      createSigningRequest(
        service.multisig.domainSeparator(),
        { kind: "update_quorum", quorum: 1 },
        1n,
      ),
    );

    const recorded = await service.setQuorum(1, signatures);

    expect(recorded).toEqual({ sequence: 4, nonce: "1", event: { type: "quorum_updated", quorum: 1 } });
    expect(lines.map((l) => [l.level, l.msg])).toEqual([
      [50, "Event subscriber failed"],
      [30, "Action applied"],
    ]);
    expect(lines[0]).toMatchObject({
      sequence: 4,
      event: "quorum_updated",
      err: { message: "subscriber failed" },
    });
  });

  it("serializes events with bigints as strings", () => {
    const { service, signers } = makeService();

    expect(service.events()).toEqual([
      { sequence: 1, nonce: "0", event: { type: "signer_updated", signer: signers[0]!.address, trusted: true } },
      { sequence: 2, nonce: "0", event: { type: "signer_updated", signer: signers[1]!.address, trusted: true } },
      { sequence: 3, nonce: "0", event: { type: "quorum_updated", quorum: 2 } },
    ]);
  });

  it("builds signing requests at the current nonce", () => {
    const { service } = makeService();
    const request = service.signingRequest({ kind: "update_quorum", quorum: 1 });

    expect(request).toEqual({
      action: { kind: "update_quorum", quorum: 1 },
      nonce: "1",
      digest: createSigningRequest(
        service.multisig.domainSeparator(),
        { kind: "update_quorum", quorum: 1 },
        1n,
      ).digest,
    });
  });
});
