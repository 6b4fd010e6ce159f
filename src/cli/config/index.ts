/**
 * Public configuration exports: types, loading, validation, presets and
 * duration parsing.
 */

export {
  availablePresets,
  BUILTIN_CHECK_NAMES,
  type BuiltinCheckName,
  DEFAULT_CHECKS,
  findPreset,
  isBuiltinCheck,
  type Preset,
  type PresetName,
  presetDescription,
} from './check-registry.ts';
export {
  configForPreset,
  defaultConfig,
  findConfigFile,
  type LoadedConfig,
  loadConfig,
  loadConfigFrom,
  loadConfigOrDefault,
  parseConfig,
  serializeConfig,
  validateConfig,
} from './config.ts';
export { isValidDuration, parseDuration } from './duration.ts';
export { isMode, isThoroughMode, MODES, modeConfigFor, parseMode, policyFor } from './mode.ts';
export type * from './types.ts';
