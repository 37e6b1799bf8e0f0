/**
 * @unitvec/config: Load unitvec settings from config files and the
 * environment.
 *
 * @packageDocumentation
 */

export {
  ConfigError,
  applyConfig,
  defineConfig,
  enabledInterop,
  loadConfig,
  loadConfigFromEnv,
  type Environment,
  type LoadConfigOptions,
  type LoadedConfig,
} from "./config.js";

export { INTEROP_LIBRARIES, InteropConfig, UnitvecConfig, type InteropLibrary } from "./schema.js";
