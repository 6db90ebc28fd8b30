/**
 * AgentWire - Barrel export for the messaging core.
 * -------------------------------------------------
 * Core types and errors live in src/core/, the protocol in src/a2a/.
 */

export * from "./core";
export * from "./a2a";
export {
  loadAgentConfig,
  getApiKey,
  hasEnvConfig,
  AgentConfigSchema,
  type AgentConfig,
  type LoadAgentConfigOptions,
} from "./config/loader";
export { createLogger, getDefaultLogger, type LoggerOptions } from "./utils/logger";
export { retryAsync, type RetryOptions } from "./utils/retry";
