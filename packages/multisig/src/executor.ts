/**
 * Executor
 *
 * The arbitrary external call behind `execute` is an injected capability.
 * The module forwards (target, value, payload) unchanged: there is no
 * allow-list and no inspection of the payload. The signers are the only
 * safeguard.
 */

import { getAddress, type Address, type Hex } from "viem";

// =============================================================================
// Interface
// =============================================================================

export interface ExternalCall {
  readonly target: Address;
  readonly value: bigint;
  readonly payload: Hex;
}

/**
 * Invoke an external target.
 *
 * Resolve `false` (or throw) to signal failure; the module then aborts
 * the action with EXECUTION_FAILED and rolls back.
 */
export interface CallExecutor {
  invoke(call: ExternalCall): Promise<boolean>;
}

// =============================================================================
// In-Process Dispatch
// =============================================================================

export type CallHandler = (call: ExternalCall) => boolean | Promise<boolean>;

/**
 * Command-dispatch executor: routes calls to handlers registered per
 * target address.
 *
 * A target without a handler behaves like an account with no code, so the
 * call is a plain value transfer and succeeds. Every invocation that
 * resolves `true` is recorded.
 */
export class DispatchExecutor implements CallExecutor {
  private readonly handlers = new Map<Address, CallHandler>();
  private readonly delivered: ExternalCall[] = [];

  register(target: Address, handler: CallHandler): void {
    this.handlers.set(getAddress(target), handler);
  }

  unregister(target: Address): boolean {
    return this.handlers.delete(getAddress(target));
  }

  async invoke(call: ExternalCall): Promise<boolean> {
    const handler = this.handlers.get(getAddress(call.target));
    const ok = handler === undefined ? true : await handler(call);
    if (ok) {
      this.delivered.push(call);
    }
    return ok;
  }

  /**
   * Successful calls in delivery order.
   */
  getDelivered(): readonly ExternalCall[] {
    return [...this.delivered];
  }
}
