/**
 * @coffer/node — HTTP surface for the vault ledger.
 *
 * Exposes the Hono app factory, the LedgerService composition root and
 * the config loader. main.ts is the executable entry point.
 *
 * @packageDocumentation
 */

export { LedgerService } from "./services/ledger-service.js";
export type {
  LedgerServiceConfig,
  VaultResource,
} from "./services/ledger-service.js";
export { loadConfig, parseIdentityList, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./types/index.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
