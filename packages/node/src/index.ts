/**
 * @txrelay/node — HTTP surface over the transaction pipeline.
 */

export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export {
  loadConfig,
  ConfigSchema,
  gasPolicyConfig,
  reconcilerConfig,
  retryConfig,
} from "./config.js";
export type { AppConfig } from "./config.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
