/**
 * @streamledger/node - HTTP host for the stream ledger.
 *
 * Package public API. The server itself starts from main.ts.
 */

export { StreamService, systemNow } from "./services/stream-service.js";
export type {
  StreamServiceConfig,
  CreateStreamInput,
  WithdrawalReceipt,
  LedgerInfo,
} from "./services/stream-service.js";
export { loadConfig, parseApiKeys, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
