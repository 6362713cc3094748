/**
 * @stepwise/cli
 *
 * Command line runner for Stepwise agents
 */

export { cli } from "./cli.js";
export {
  loadSettings,
  SettingsSchema,
  ConfigError,
  DEFAULT_SYSTEM_PROMPT,
  PROVIDERS,
  type Settings,
  type ProviderName,
  type LoadSettingsOptions,
} from "./config.js";
export { createProvider } from "./provider.js";
