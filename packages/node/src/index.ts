/**
 * @yieldsplit/node — HTTP service for yield distribution.
 *
 * @packageDocumentation
 */

export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export {
  loadConfig,
  parseApiKeys,
  parseAddressList,
  toServiceConfig,
  ConfigSchema,
} from "./config.js";
export type { AppConfig } from "./config.js";
export { YieldSplitService } from "./services/yieldsplit-service.js";
export type { YieldSplitServiceConfig, EventQuery } from "./services/yieldsplit-service.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
