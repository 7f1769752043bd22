/**
 * @quorumkit/node: Entry point.
 *
 * Loads config, builds the executor and module, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import { pino } from "pino";
import {
  DispatchExecutor,
  RpcCallExecutor,
  type CallExecutor,
} from "@quorumkit/multisig";
import { loadConfig, parseSignerList, quorumWarnings, type AppConfig } from "./config.js";
import { createApp } from "./app.js";
import { MultisigService } from "./services/multisig-service.js";

interface Executor {
  readonly executor: CallExecutor;
  readonly close: () => Promise<void>;
}

async function createExecutor(config: AppConfig): Promise<Executor> {
  if (config.EXECUTOR === "dispatch") {
    return { executor: new DispatchExecutor(), close: async () => undefined };
  }
  if (config.RPC_URL === undefined || config.EXECUTOR_PRIVATE_KEY === undefined) {
    throw new Error("EXECUTOR=rpc requires RPC_URL and EXECUTOR_PRIVATE_KEY");
  }

  const rpc = new RpcCallExecutor({
    rpcUrl: config.RPC_URL,
    chainId: config.CHAIN_ID,
    privateKey: config.EXECUTOR_PRIVATE_KEY,
  });
  await rpc.connect();
  return { executor: rpc, close: () => rpc.disconnect() };
}

// =============================================================================
// Bootstrap
// =============================================================================

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const signers = parseSignerList(config.SIGNERS);
  for (const warning of quorumWarnings(config.QUORUM, signers)) {
    logger.warn({ quorum: config.QUORUM }, warning);
  }

  const { executor, close } = await createExecutor(config);
  const service = new MultisigService(
    {
      name: config.MULTISIG_NAME,
      chainId: config.CHAIN_ID,
      verifyingContract: config.MODULE_ADDRESS,
      signers,
      quorum: config.QUORUM,
    },
    { executor, logger: logger.child({ module: "multisig" }) },
  );

  const { app } = createApp({
    service,
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    {
      port: config.PORT,
      host: config.HOST,
      executor: config.EXECUTOR,
      domainSeparator: service.state().domainSeparator,
    },
    "Multisig node started",
  );

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutdown signal received");
    server.close();
    await close();
    logger.info("Shutdown complete");
    process.exit(0);
  };

  const onSignal = (signal: string) => () => {
    shutdown(signal).catch((err: unknown) => {
      logger.error({ err }, "Shutdown failed");
      process.exit(1);
    });
  };
  process.on("SIGTERM", onSignal("SIGTERM"));
  process.on("SIGINT", onSignal("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
