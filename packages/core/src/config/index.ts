export {
  DEFAULT_ROOT_PATH,
  CONFIG_FILE_NAME,
  buildDefaults,
  errorViewFor,
} from "./defaults.js";
export {
  configPathFor,
  loadConfig,
  saveConfig,
  type LoadConfigOptions,
} from "./loader.js";
export { expandHomePath, resolveRootPath, ROOT_PATH_ENV } from "./paths.js";
export {
  MemoryConfigSource,
  createFileConfigSource,
  type ConfigSource,
} from "./source.js";
export { resolveConfig } from "./resolve.js";
export { ConfigRegistry } from "./registry.js";
