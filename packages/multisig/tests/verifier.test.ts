/**
 * Tests for SignatureVerifier.
 *
 * Verifies:
 * - Strictly ascending, trusted signers pass
 * - Duplicates, descending order and untrusted signers fail with INVALID_SIGNATURES
 * - Short arrays fail with SIGNATURE_INDEX_OUT_OF_RANGE
 * - Entries past the quorum are never inspected
 * - Unrecoverable signatures fail with INVALID_SIGNATURES
 * - The recoverer is pluggable
 */

import { describe, it, expect, vi } from "vitest";
import { getAddress, keccak256, toHex, type Hex } from "viem";
import { SignatureVerifier } from "../src/verifier.js";
import { SignerRegistry } from "../src/signer-registry.js";
import { secp256k1Recoverer, type SignatureRecoverer } from "../src/recovery.js";
import { signRequest, type DigestSigner } from "../src/signing.js";
import { MultisigError, type Signature } from "../src/types.js";
import { makeSigners, testAccount } from "./helpers/signers.js";

const DIGEST: Hex = keccak256(toHex("verifier-test-digest"));

async function signAll(signers: readonly DigestSigner[]): Promise<Signature[]> {
  const request = { action: { kind: "update_quorum", quorum: 0 }, nonce: 0n, digest: DIGEST } as const;
  const out: Signature[] = [];
  for (const signer of signers) {
    out.push(await signRequest(signer, request));
  }
  return out;
}

async function expectCode(promise: Promise<unknown>, code: MultisigError["code"]): Promise<void> {
  await expect(promise).rejects.toBeInstanceOf(MultisigError);
  await expect(promise).rejects.toMatchObject({ code });
}

describe("SignatureVerifier", () => {
  const signers = makeSigners(4);
  const registry = new SignerRegistry(signers.map((s) => s.address));
  const verifier = new SignatureVerifier(registry, secp256k1Recoverer);

  it("accepts trusted signers in ascending order", async () => {
    const sigs = await signAll(signers.slice(0, 3));
    const recovered = await verifier.verify(DIGEST, sigs, 3);
    expect(recovered).toEqual(signers.slice(0, 3).map((s) => s.address));
  });

  it("accepts a non-contiguous ascending subset", async () => {
    const sigs = await signAll([signers[0]!, signers[3]!]);
    await expect(verifier.verify(DIGEST, sigs, 2)).resolves.toHaveLength(2);
  });

  it("rejects a duplicated signer", async () => {
    const sigs = await signAll([signers[0]!, signers[0]!]);
    await expectCode(verifier.verify(DIGEST, sigs, 2), "INVALID_SIGNATURES");
  });

  it("rejects descending order", async () => {
    const sigs = await signAll([signers[1]!, signers[0]!]);
    await expectCode(verifier.verify(DIGEST, sigs, 2), "INVALID_SIGNATURES");
  });

  it("rejects an untrusted signer", async () => {
    const outsider = testAccount("outsider");
    const sigs = await signAll([outsider]);
    await expectCode(verifier.verify(DIGEST, sigs, 1), "INVALID_SIGNATURES");
  });

  it("rejects signatures over a different digest", async () => {
    const sigs = await signAll(signers.slice(0, 2));
    await expectCode(
      verifier.verify(keccak256(toHex("other")), sigs, 2),
      "INVALID_SIGNATURES",
    );
  });

  it("fails with SIGNATURE_INDEX_OUT_OF_RANGE when fewer than quorum are supplied", async () => {
    const sigs = await signAll(signers.slice(0, 2));
    await expectCode(verifier.verify(DIGEST, sigs, 3), "SIGNATURE_INDEX_OUT_OF_RANGE");
  });

  it("reports the missing index", async () => {
    await expect(verifier.verify(DIGEST, [], 1)).rejects.toThrow(
      "Signature index 0 out of range: 0 supplied, quorum is 1",
    );
  });

  it("checks ordering before running out of signatures", async () => {
    const sigs = await signAll([signers[1]!, signers[0]!]);
    await expectCode(verifier.verify(DIGEST, sigs, 3), "INVALID_SIGNATURES");
  });

  it("ignores entries past the quorum", async () => {
    const sigs = await signAll(signers.slice(0, 2));
    const garbage: Signature = { v: 99, r: "0x01", s: "0x02" };
    const recovered = await verifier.verify(DIGEST, [...sigs, garbage, sigs[0]!], 2);
    expect(recovered).toHaveLength(2);
  });

  it("passes vacuously when quorum is zero", async () => {
    await expect(verifier.verify(DIGEST, [], 0)).resolves.toEqual([]);
  });

  it("maps an unrecoverable signature to INVALID_SIGNATURES with the cause attached", async () => {
    const [sig] = await signAll([signers[0]!]);
    const broken: Signature = { ...sig!, v: 30 };

    const error = await verifier.verify(DIGEST, [broken], 1).then(
      () => undefined,
      (e: unknown) => e,
    );
    expect(error).toBeInstanceOf(MultisigError);
    expect(error).toMatchObject({ code: "INVALID_SIGNATURES" });
    expect(error instanceof MultisigError && error.cause !== undefined).toBe(true);
  });

  it("accepts 0/1 recovery ids", async () => {
    const [sig] = await signAll([signers[0]!]);
    const compact: Signature = { ...sig!, v: sig!.v - 27 };
    await expect(verifier.verify(DIGEST, [compact], 1)).resolves.toEqual([signers[0]!.address]);
  });

  describe("pluggable recoverer", () => {
    const low = getAddress("0x0000000000000000000000000000000000000001");
    const high = getAddress("0x0000000000000000000000000000000000000002");

    function fakeSig(tag: string): Signature {
      return { v: 27, r: toHex(tag), s: "0x00" };
    }

    it("uses the injected recoverer", async () => {
      const recover = vi.fn<SignatureRecoverer["recover"]>(async (_digest, sig) =>
        sig.r === toHex("low") ? low : high,
      );
      const fake = new SignatureVerifier(new SignerRegistry([low, high]), { recover });

      await expect(fake.verify(DIGEST, [fakeSig("low"), fakeSig("high")], 2)).resolves.toEqual([
        low,
        high,
      ]);
      expect(recover).toHaveBeenCalledTimes(2);
    });

    it("stops recovering at the first failure", async () => {
      const recover = vi.fn<SignatureRecoverer["recover"]>(async () => high);
      const fake = new SignatureVerifier(new SignerRegistry([high]), { recover });

      await expectCode(
        fake.verify(DIGEST, [fakeSig("a"), fakeSig("b"), fakeSig("c")], 3),
        "INVALID_SIGNATURES",
      );
      expect(recover).toHaveBeenCalledTimes(2);
    });
  });
});
