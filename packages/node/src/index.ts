/**
 * @vestline/node — HTTP service over the vesting ledgers.
 *
 * main.ts starts the server; this module is the importable surface.
 */

export { VestingService } from "./services/vesting-service.js";
export type {
  VestingServiceConfig,
  TokenSettings,
  LedgerStats,
} from "./services/vesting-service.js";
export { loadConfig, parseApiKeys, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./types/index.js";
