/**
 * @quorumkit/node: HTTP front for a multisig module.
 */

export { MultisigService } from "./services/multisig-service.js";
export type { MultisigServiceConfig, MultisigServiceDeps } from "./services/multisig-service.js";
export { loadConfig, parseSignerList, quorumWarnings, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./types/index.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
