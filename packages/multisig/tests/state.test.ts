/**
 * Tests for MultisigState and QuorumPolicy.
 *
 * Verifies all-or-nothing behaviour of transact().
 */

import { describe, it, expect } from "vitest";
import { MultisigState } from "../src/state.js";
import { QuorumPolicy, isValidQuorum } from "../src/quorum.js";

const ALICE = "0x52908400098527886e0f7030069857d2e4169ee7";
const BOB = "0x8617e340b3d01fa5f11f306f4090fd50e238070d";

describe("QuorumPolicy", () => {
  it("accepts zero and positive integers", () => {
    expect(new QuorumPolicy(0).get()).toBe(0);
    expect(new QuorumPolicy(5).get()).toBe(5);
  });

  it("rejects negative and fractional values", () => {
    expect(() => new QuorumPolicy(-1)).toThrow(RangeError);
    expect(() => new QuorumPolicy(1.5)).toThrow(RangeError);
    expect(isValidQuorum(Number.NaN)).toBe(false);
  });

  it("does not cap the quorum at any signer count", () => {
    const policy = new QuorumPolicy(1);
    policy.set(1000);
    expect(policy.get()).toBe(1000);
  });
});

describe("MultisigState.transact", () => {
  it("keeps every change when the operation succeeds", async () => {
    const state = new MultisigState([ALICE], 1);

    await state.transact(async () => {
      state.nonce.next();
      state.quorum.set(2);
      state.signers.setTrust(BOB, true);
    });

    expect(state.nonce.current()).toBe(2n);
    expect(state.quorum.get()).toBe(2);
    expect(state.signers.isTrusted(BOB)).toBe(true);
  });

  it("rolls back every change when the operation throws", async () => {
    const state = new MultisigState([ALICE], 1);

    await expect(
      state.transact(async () => {
        state.nonce.next();
        state.quorum.set(2);
        state.signers.setTrust(ALICE, false);
        state.signers.setTrust(BOB, true);
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    expect(state.nonce.current()).toBe(1n);
    expect(state.quorum.get()).toBe(1);
    expect(state.signers.isTrusted(ALICE)).toBe(true);
    expect(state.signers.isTrusted(BOB)).toBe(false);
  });

  it("returns the operation's result", async () => {
    const state = new MultisigState([], 0);
    await expect(state.transact(async () => 42)).resolves.toBe(42);
  });
});
