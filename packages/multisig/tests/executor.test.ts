/**
 * Tests for DispatchExecutor.
 */

import { describe, it, expect, vi } from "vitest";
import { getAddress } from "viem";
import { DispatchExecutor, type ExternalCall } from "../src/executor.js";

const VAULT = getAddress("0x00000000000000000000000000000000000000aa");

function call(overrides: Partial<ExternalCall> = {}): ExternalCall {
  return { target: VAULT, value: 0n, payload: "0x", ...overrides };
}

describe("DispatchExecutor", () => {
  it("treats an unregistered target as a plain value transfer", async () => {
    const executor = new DispatchExecutor();
    await expect(executor.invoke(call({ value: 5n }))).resolves.toBe(true);
    expect(executor.getDelivered()).toEqual([call({ value: 5n })]);
  });

  it("routes to the registered handler", async () => {
    const executor = new DispatchExecutor();
    const handler = vi.fn(() => true);
    executor.register(VAULT, handler);

    await executor.invoke(call({ payload: "0x1234" }));

    expect(handler).toHaveBeenCalledWith(call({ payload: "0x1234" }));
  });

  it("matches targets regardless of case", async () => {
    const executor = new DispatchExecutor();
    const handler = vi.fn(async () => false);
    executor.register("0x00000000000000000000000000000000000000AA", handler);

    await expect(executor.invoke(call())).resolves.toBe(false);
    expect(handler).toHaveBeenCalledTimes(1);
  });

  it("does not record failed calls", async () => {
    const executor = new DispatchExecutor();
    executor.register(VAULT, () => false);

    await executor.invoke(call());

    expect(executor.getDelivered()).toEqual([]);
  });

  it("propagates handler errors", async () => {
    const executor = new DispatchExecutor();
    executor.register(VAULT, () => {
      throw new Error("handler exploded");
    });

    await expect(executor.invoke(call())).rejects.toThrow("handler exploded");
  });

  it("unregister restores plain-transfer behaviour", async () => {
    const executor = new DispatchExecutor();
    executor.register(VAULT, () => false);

    expect(executor.unregister(VAULT)).toBe(true);
    await expect(executor.invoke(call())).resolves.toBe(true);
  });
});
