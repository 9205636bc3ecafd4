/**
 * Barrel exports for the config module.
 */

export { createConfigSystem, ConfigSystemImpl, CONFIG_FILE_NAME } from './config-system-impl.js'
export type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
export {
  TexsmithConfigSchema,
  PartialTexsmithConfigSchema,
  CURRENT_CONFIG_FORMAT_VERSION,
} from './config-schema.js'
export type {
  TexsmithConfig,
  PartialTexsmithConfig,
  GlobalSettings,
  CompilerSettings,
} from './config-schema.js'
export { DEFAULT_CONFIG } from './defaults.js'
