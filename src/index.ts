export * from "./context-budget";
export {
  loadConfig,
  resolveAppSettings,
  ChatBudgetConfigSchema,
  type AppSettings,
  type ChatBudgetConfig,
  type ConfigLoadResult,
} from "./config";
export { logger, configureLogger, type LogLevel } from "./logger";
