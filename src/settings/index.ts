/**
 * Setting resolution for module handlers.
 */

export {
  resolveSetting,
  resolveTaggedSetting,
  resolveChoice,
  resolveDecimal,
  isTruthySetting,
  parseDecimal,
  type ResolvedSetting,
  type ResolvedValue,
} from "./resolver.js";

export {
  SettingsError,
  UnknownSettingError,
  UnknownModuleError,
  InvalidOptionError,
  MissingValueError,
  TypeConversionError,
  UnsupportedFieldKindError,
  SettingKindMismatchError,
} from "./errors.js";
