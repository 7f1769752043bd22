/**
 * Tests for the off-platform signing kit.
 */

import { describe, it, expect } from "vitest";
import { keccak256, toHex, type Hex } from "viem";
import {
  collectSignatures,
  createSigningRequest,
  signRequest,
  sortSignatures,
  toSignature,
} from "../src/signing.js";
import { actionDigest } from "../src/digest.js";
import { secp256k1Recoverer } from "../src/recovery.js";
import type { Signature } from "../src/types.js";
import { makeModule, makeSigners, TARGET } from "./helpers/signers.js";

const DIGEST: Hex = keccak256(toHex("signing-test"));

describe("signing kit", () => {
  describe("toSignature", () => {
    it("splits a 65-byte signature", async () => {
      const [signer] = makeSigners(1);
      const raw = await signer!.sign({ hash: DIGEST });
      const sig = toSignature(raw);

      expect(sig.r).toBe(`0x${raw.slice(2, 66)}`);
      expect(sig.s).toBe(`0x${raw.slice(66, 130)}`);
      expect(sig.v).toBe(Number(`0x${raw.slice(130)}`));
      expect([27, 28]).toContain(sig.v);
    });

    it("maps a 0/1 recovery byte to 27/28", async () => {
      const [signer] = makeSigners(1);
      const raw = await signer!.sign({ hash: DIGEST });
      const { v } = toSignature(raw);
      const compact: Hex = `0x${raw.slice(2, 130)}${v === 27 ? "00" : "01"}`;

      expect(toSignature(compact)).toEqual(toSignature(raw));
    });
  });

  describe("createSigningRequest", () => {
    it("binds the digest to the action and nonce", () => {
      const { multisig } = makeModule();
      const action = { kind: "update_quorum", quorum: 1 } as const;
      const request = createSigningRequest(multisig.domainSeparator(), action, 4n);

      expect(request).toEqual({
        action,
        nonce: 4n,
        digest: actionDigest(multisig.domainSeparator(), action, 4n),
      });
    });
  });

  describe("ordering", () => {
    it("sortSignatures orders by recovered address", async () => {
      const signers = makeSigners(4);
      const request = { action: { kind: "update_quorum", quorum: 1 }, nonce: 1n, digest: DIGEST } as const;
      const ascending: Signature[] = [];
      for (const s of signers) {
        ascending.push(await signRequest(s, request));
      }

      const sorted = await sortSignatures(DIGEST, [...ascending].reverse());
      expect(sorted).toEqual(ascending);
    });

    it("collectSignatures returns signatures recovering in ascending order", async () => {
      const signers = makeSigners(5);
      const request = { action: { kind: "update_quorum", quorum: 1 }, nonce: 1n, digest: DIGEST } as const;

      const sigs = await collectSignatures([...signers].reverse(), request);
      const recovered = await Promise.all(sigs.map((s) => secp256k1Recoverer.recover(DIGEST, s)));

      expect(recovered).toEqual(signers.map((s) => s.address));
    });
  });

  describe("wallet interoperability", () => {
    it("accepts EIP-712 signatures produced by signTypedData", async () => {
      const { multisig, executor, signers } = makeModule(3, 2);
      const domain = multisig.domain();

      const raw = await Promise.all(
        signers.map((account) =>
          account.signTypedData({
            domain,
            types: {
              Execute: [
                { name: "target", type: "address" },
                { name: "value", type: "uint256" },
                { name: "payload", type: "bytes" },
                { name: "nonce", type: "uint256" },
              ],
            },
            primaryType: "Execute",
            message: { target: TARGET, value: 3n, payload: "0xc0ffee", nonce: multisig.nonce() },
          }),
        ),
      );
      const digest = actionDigest(
        multisig.domainSeparator(),
        { kind: "execute", target: TARGET, value: 3n, payload: "0xc0ffee" },
        multisig.nonce(),
      );
      const sigs = await sortSignatures(digest, raw.map(toSignature));

      await multisig.execute(TARGET, 3n, "0xc0ffee", sigs);
      expect(executor.getDelivered()).toEqual([{ target: TARGET, value: 3n, payload: "0xc0ffee" }]);
    });
  });
});
