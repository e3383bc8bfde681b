export {
  migrateLegacyConfigs,
  resolveLegacyFile,
  INJECTOR_CONFIG_FILENAME,
  UNLOCKER_CONFIG_FILENAME,
} from "./migrator";
export type { MigrationInput, MigrationResult, MigrationDiagnostics } from "./migrator";
export {
  parseInjectorLegacy,
  parseLegacyBoolean,
  updateInjectorIni,
} from "./injector-legacy";
export type { InjectorLegacyConfig, InjectorParseResult } from "./injector-legacy";
export {
  stripLineComments,
  parseUnlockerLegacy,
  toUnlockerPlatforms,
  isRecord,
  isReservedKey,
  DEFAULT_PLATFORM_SETTINGS,
} from "./unlocker-legacy";
export type {
  UnlockerLegacyConfig,
  UnlockerParseResult,
  UnlockerPlatformEntry,
} from "./unlocker-legacy";
export {
  mergeLegacyConfigs,
  defaultUnifiedConfig,
  serializeUnifiedConfig,
  validateUnifiedConfig,
  loadUnifiedConfig,
  deepFreeze,
  UNIFIED_CONFIG_FILENAME,
  INJECTOR_PLATFORM,
} from "./unified-config";
export type { ConfigValidationResult, ValidationIssue } from "./unified-config";
