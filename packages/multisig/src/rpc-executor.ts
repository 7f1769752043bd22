/**
 * RPC Call Executor: forwards authorized calls to an EVM chain.
 *
 * Uses viem for all chain interactions. Each call is sent as a transaction
 * from the configured executor key; the call succeeds iff the mined
 * receipt reports `success`.
 */

import {
  createPublicClient,
  createWalletClient,
  http,
  type Chain,
  type Hex,
  type HttpTransport,
  type PublicClient,
  type WalletClient,
} from "viem";
import { privateKeyToAccount, type PrivateKeyAccount } from "viem/accounts";
import { anvil, arbitrum, base, mainnet, optimism, polygon, sepolia } from "viem/chains";
import type { CallExecutor, ExternalCall } from "./executor.js";

// =============================================================================
// Chain ID to viem Chain mapping
// =============================================================================

const VIEM_CHAINS: Readonly<Record<number, Chain>> = {
  [mainnet.id]: mainnet,
  [sepolia.id]: sepolia,
  [base.id]: base,
  [arbitrum.id]: arbitrum,
  [optimism.id]: optimism,
  [polygon.id]: polygon,
  [anvil.id]: anvil,
};

export function supportedChainIds(): readonly number[] {
  return Object.keys(VIEM_CHAINS).map(Number);
}

// =============================================================================
// Configuration
// =============================================================================

export interface RpcExecutorConfig {
  /** JSON-RPC endpoint */
  readonly rpcUrl: string;

  /** EVM chain id (e.g. 1, 11155111) */
  readonly chainId: number;

  /** Key that pays for and sends the forwarded transactions */
  readonly privateKey: Hex;

  /** Optional: request timeout in ms */
  readonly timeoutMs?: number;
}

// =============================================================================
// RPC Call Executor
// =============================================================================

export class RpcCallExecutor implements CallExecutor {
  private wallet: WalletClient<HttpTransport, Chain, PrivateKeyAccount> | null = null;
  private reader: PublicClient<HttpTransport, Chain> | null = null;
  private readonly config: RpcExecutorConfig;
  private readonly chain: Chain;

  constructor(config: RpcExecutorConfig) {
    const chain = VIEM_CHAINS[config.chainId];
    if (!chain) {
      throw new Error(
        `RpcCallExecutor: unsupported chain ${config.chainId}. ` +
          `Supported: ${supportedChainIds().join(", ")}`,
      );
    }
    this.chain = chain;
    this.config = config;
  }

  /**
   * Address the forwarded transactions are sent from.
   */
  get sender(): PrivateKeyAccount["address"] {
    return privateKeyToAccount(this.config.privateKey).address;
  }

  async connect(): Promise<void> {
    const transport = http(this.config.rpcUrl, {
      timeout: this.config.timeoutMs ?? 30_000,
    });

    this.wallet = createWalletClient({
      account: privateKeyToAccount(this.config.privateKey),
      chain: this.chain,
      transport,
    });
    this.reader = createPublicClient({
      chain: this.chain,
      transport,
    });
  }

  async disconnect(): Promise<void> {
    this.wallet = null;
    this.reader = null;
  }

  isConnected(): boolean {
    return this.wallet !== null && this.reader !== null;
  }

  async invoke(call: ExternalCall): Promise<boolean> {
    if (!this.wallet || !this.reader) {
      throw new Error("RpcCallExecutor: not connected");
    }

    const hash = await this.wallet.sendTransaction({
      to: call.target,
      value: call.value,
      data: call.payload,
    });
    const receipt = await this.reader.waitForTransactionReceipt({ hash });
    return receipt.status === "success";
  }
}
