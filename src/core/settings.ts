import path from "node:path";

import { FlowCompilerError } from "./errors.js";
import type { ConverterSettings } from "./types.js";

type SettingValue = string | boolean;

type KeysOfType<T, V> = { [K in keyof T]-?: T[K] extends V ? K : never }[keyof T];

type PathKey = "articyJsonPath" | "targetDir";
type StringKey = Exclude<KeysOfType<ConverterSettings, string>, PathKey>;
type BoolKey = KeysOfType<ConverterSettings, boolean>;
type ListKey = KeysOfType<ConverterSettings, string[]>;

export const DEFAULT_SETTINGS: Omit<ConverterSettings, "articyJsonPath" | "targetDir"> = {
  filePrefix: "articy_",
  baseFileName: "start.rpy",
  variablesFileName: "variables.rpy",
  charactersFileName: "characters.rpy",
  logFileName: "log.txt",
  characterPrefix: "character.",
  labelPrefix: "label_",
  startLabel: "start",
  endLabel: "end",
  startNode: null,
  menuDisplayTextBox: true,
  markdownTextStyles: false,
  relativeImgsInBraces: false,
  beginningsLogLines: ["# todo", "#todo"],
  repeatMenuText: false,
  featuresRenpyCharacterParams: ["RenPyCharacterParams"],
  renpyCharacterName: "RenPyCharacterName",
  renpyBox: ["RenPyBox"],
};

const PATH_FIELDS: Record<string, PathKey> = {
  path_articy_json: "articyJsonPath",
  path_target_dir: "targetDir",
};

const STRING_FIELDS: Record<string, StringKey> = {
  file_prefix: "filePrefix",
  base_file_name: "baseFileName",
  variables_file_name: "variablesFileName",
  characters_file_name: "charactersFileName",
  log_file_name: "logFileName",
  character_prefix: "characterPrefix",
  label_prefix: "labelPrefix",
  start_label: "startLabel",
  end_label: "endLabel",
  renpy_character_name: "renpyCharacterName",
};

const BOOL_FIELDS: Record<string, BoolKey> = {
  menu_display_text_box: "menuDisplayTextBox",
  markdown_text_styles: "markdownTextStyles",
  relative_imgs_in_braces: "relativeImgsInBraces",
  repeat_menu_text: "repeatMenuText",
};

const LIST_FIELDS: Record<string, ListKey> = {
  beginnings_log_lines: "beginningsLogLines",
  features_renpy_character_params: "featuresRenpyCharacterParams",
  renpy_box: "renpyBox",
};

/** INI keys whose values are comma-separated lists. */
export const LIST_SETTING_KEYS: readonly string[] = Object.keys(LIST_FIELDS);

export const splitList = (raw: string): string[] =>
  raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

const lookup = <V>(table: Record<string, V>, name: string): V | undefined =>
  Object.hasOwn(table, name) ? table[name] : undefined;

const asText = (value: SettingValue): string => {
  if (typeof value === "boolean") {
    return value ? "true" : "false";
  }
  return value.trim();
};

const parseBool = (name: string, value: SettingValue): boolean => {
  if (typeof value === "boolean") {
    return value;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "true") {
    return true;
  }
  if (normalized === "false") {
    return false;
  }
  throw new FlowCompilerError(
    "CONFIG_INVALID_VALUE",
    `Setting "${name}" must be True or False, got "${value}".`
  );
};

/**
 * Builds settings from a flat key/value map (INI sections already merged).
 * Relative paths resolve against `baseDir`.
 */
export const resolveSettings = (
  raw: Record<string, SettingValue>,
  baseDir: string
): ConverterSettings => {
  const settings: ConverterSettings = {
    ...DEFAULT_SETTINGS,
    beginningsLogLines: [...DEFAULT_SETTINGS.beginningsLogLines],
    featuresRenpyCharacterParams: [...DEFAULT_SETTINGS.featuresRenpyCharacterParams],
    renpyBox: [...DEFAULT_SETTINGS.renpyBox],
    articyJsonPath: "",
    targetDir: "",
  };

  for (const [name, value] of Object.entries(raw)) {
    const pathKey = lookup(PATH_FIELDS, name);
    const stringKey = lookup(STRING_FIELDS, name);
    const boolKey = lookup(BOOL_FIELDS, name);
    const listKey = lookup(LIST_FIELDS, name);
    if (pathKey) {
      const text = asText(value);
      settings[pathKey] = text.length > 0 ? path.resolve(baseDir, text) : "";
    } else if (stringKey) {
      settings[stringKey] = asText(value);
    } else if (boolKey) {
      settings[boolKey] = parseBool(name, value);
    } else if (listKey) {
      settings[listKey] = splitList(asText(value));
    } else if (name === "start_node") {
      const text = asText(value);
      settings.startNode = text.length > 0 ? text : null;
    } else {
      throw new FlowCompilerError("CONFIG_UNKNOWN_KEY", `Unknown setting "${name}".`);
    }
  }

  if (!settings.articyJsonPath) {
    throw new FlowCompilerError("CONFIG_MISSING_KEY", 'Missing required setting "path_articy_json".');
  }
  if (!settings.targetDir) {
    throw new FlowCompilerError("CONFIG_MISSING_KEY", 'Missing required setting "path_target_dir".');
  }
  return settings;
};

export const createSettings = (overrides: Partial<ConverterSettings> = {}): ConverterSettings => ({
  ...DEFAULT_SETTINGS,
  articyJsonPath: "articy_export.json",
  targetDir: "game/articy",
  ...overrides,
});
