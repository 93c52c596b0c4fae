/**
 * @closeout/node — HTTP service for settlement-cycle closure.
 *
 * Import this module to embed the app; run main.ts to serve it.
 */

export { SettlementService } from "./services/settlement-service.js";
export type { SettlementServiceDeps } from "./services/settlement-service.js";
export { loadConfig, parseApiKeys, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
