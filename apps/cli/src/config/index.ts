export {
  CONFIG_KEYS,
  DEFAULTS,
  ENV_MAP,
  isConfigKey,
} from "./defaults";
export type { ConfigData } from "./defaults";
export {
  readConfigFile,
  writeConfigFile,
  updateConfigFile,
  parseConfigData,
  getConfigPath,
} from "./configFile";
export { resolveConfig, mergeConfig, getSource, setCliOverride, getCliOverrides } from "./resolve";
export { toGameSettings } from "./settings";
