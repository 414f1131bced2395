export {
  DEFAULT_ROOT_PATH,
  DEFAULT_CONFIG_FILENAME,
  DEFAULT_MOCK_ENDPOINT,
  DEFAULT_REGION,
} from "./defaults.js";
export { loadConfig, type LoadConfigOptions } from "./loader.js";
export { expandHomePath, resolveRootPath, mirrorRootFor } from "./paths.js";
export {
  resolveSettings,
  type SettingOverrides,
  type StorageSettings,
} from "./resolve.js";
