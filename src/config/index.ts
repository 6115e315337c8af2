export {
  loadConfig,
  resolveConfigPath,
  defaultConfigPath,
  type ConfigLoadResult,
  type ConfigSource,
} from "./loader";
export { ChatBudgetConfigSchema, type ChatBudgetConfig } from "./schema";
export { resolveAppSettings, type AppSettings } from "./settings";
