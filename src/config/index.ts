export {
  CONFIG_DIR_NAME,
  CONFIG_FILE_NAME,
  DEFAULT_EXE_EXTENSIONS,
  DEFAULT_PACKAGE_DIRS,
  defaultConfig,
  getDefaultConfigDocument,
} from './defaults.js';
export { ConfigLoader, loadConfig, parseConfig, toConfig } from './loader.js';
export { type ConfigDirEnvironment, getConfigPath, getUserConfigDir } from './paths.js';
export { type ConfigDocument, configSchema, validateConfigDocument } from './schema.js';
