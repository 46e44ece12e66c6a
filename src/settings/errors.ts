/**
 * Setting resolution errors.
 *
 * Each one is a configuration or schema authoring mistake. They are raised
 * to the caller and abort the module, carrying the module id and setting
 * name so the offending definition can be found.
 */

export class SettingsError extends Error {
  public readonly moduleId: string;
  public readonly settingName: string;

  constructor(message: string, moduleId: string, settingName: string) {
    super(message);
    this.name = "SettingsError";
    this.moduleId = moduleId;
    this.settingName = settingName;
  }
}

export class UnknownSettingError extends SettingsError {
  public readonly validSettings: readonly string[];

  constructor(moduleId: string, settingName: string, validSettings: readonly string[]) {
    super(
      `Failed to extract setting '${settingName}' for module ${moduleId}: it was not found ` +
        `within the module settings. Valid options are: [${validSettings.join(", ")}]`,
      moduleId,
      settingName
    );
    this.name = "UnknownSettingError";
    this.validSettings = validSettings;
  }
}

export class UnknownModuleError extends SettingsError {
  constructor(moduleId: string, settingName: string, knownModules: readonly string[]) {
    super(
      `Cannot resolve setting '${settingName}': module ${moduleId} has no definition. ` +
        `Defined modules: [${knownModules.join(", ")}]`,
      moduleId,
      settingName
    );
    this.name = "UnknownModuleError";
  }
}

export class InvalidOptionError extends SettingsError {
  public readonly label: string;
  public readonly validOptions: readonly string[];

  constructor(
    moduleId: string,
    settingName: string,
    label: string,
    validOptions: readonly string[]
  ) {
    super(
      `Module ${moduleId} setting '${settingName}': '${label}' is not a valid option. ` +
        `Valid options are: [${validOptions.join(", ")}]`,
      moduleId,
      settingName
    );
    this.name = "InvalidOptionError";
    this.label = label;
    this.validOptions = validOptions;
  }
}

export class MissingValueError extends SettingsError {
  constructor(moduleId: string, settingName: string) {
    super(`Module ${moduleId} setting '${settingName}' has no selected value`, moduleId, settingName);
    this.name = "MissingValueError";
  }
}

export class TypeConversionError extends SettingsError {
  constructor(moduleId: string, settingName: string, rawValue: unknown, expected: string) {
    super(
      `Module ${moduleId} setting '${settingName}': cannot convert ${JSON.stringify(rawValue)} to ${expected}`,
      moduleId,
      settingName
    );
    this.name = "TypeConversionError";
  }
}

export class UnsupportedFieldKindError extends SettingsError {
  constructor(moduleId: string, settingName: string, kind: string, supported: readonly string[]) {
    super(
      `Module ${moduleId} setting '${settingName}': field kind '${kind}' is not supported. ` +
        `Supported kinds are: ${supported.join(", ")}`,
      moduleId,
      settingName
    );
    this.name = "UnsupportedFieldKindError";
  }
}

export class SettingKindMismatchError extends SettingsError {
  constructor(moduleId: string, settingName: string, expected: string, actual: string) {
    super(
      `Module ${moduleId} setting '${settingName}' is declared as '${actual}', expected '${expected}'`,
      moduleId,
      settingName
    );
    this.name = "SettingKindMismatchError";
  }
}
