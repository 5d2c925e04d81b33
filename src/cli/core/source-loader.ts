import fs from "node:fs";
import path from "node:path";

import ini from "ini";

import { FlowCompilerError } from "../../core/errors.js";
import { LIST_SETTING_KEYS, resolveSettings } from "../../core/settings.js";
import type { ConverterSettings } from "../../core/types.js";
import { AUDIO_EXTENSIONS, IMAGE_EXTENSIONS } from "../../compiler/text.js";

export const DEFAULT_SETTINGS_FILE = "config.ini";

const ASSET_EXTENSIONS = [...IMAGE_EXTENSIONS, ...AUDIO_EXTENSIONS];

const toPosixPath = (filePath: string): string => filePath.split(path.sep).join("/");

const flattenSections = (
  parsed: Record<string, unknown>,
  into: Record<string, string | boolean>
): Record<string, string | boolean> => {
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value === "string" || typeof value === "boolean") {
      into[key] = value;
    } else if (typeof value === "object" && value !== null && !Array.isArray(value)) {
      flattenSections(Object.fromEntries(Object.entries(value)), into);
    }
  }
  return into;
};

const ASSIGNMENT_PATTERN = /^([^=;#[][^=]*?)\s*=\s*(.*?)\s*$/;

/**
 * Right-hand sides of list keys as written. `ini` cuts unquoted values at
 * `#` and `;`, which list items such as `# todo` start with.
 */
const rawListValues = (source: string): Record<string, string> => {
  const values: Record<string, string> = {};
  for (const line of source.split(/\r?\n/)) {
    const match = ASSIGNMENT_PATTERN.exec(line.trim());
    if (!match || !LIST_SETTING_KEYS.includes(match[1])) {
      continue;
    }
    const value = match[2];
    const quote = value[0];
    const quoted = value.length >= 2 && (quote === "\"" || quote === "'") && value.endsWith(quote);
    values[match[1]] = quoted ? value.slice(1, -1) : value;
  }
  return values;
};

/**
 * Reads an INI settings file; sections are merged into one flat map. List
 * values are taken verbatim, so `#` and `;` need no quoting there.
 */
export const loadSettingsFile = (settingsPath: string): ConverterSettings => {
  const resolved = path.resolve(settingsPath);
  if (!fs.existsSync(resolved)) {
    throw new FlowCompilerError("CONFIG_NOT_FOUND", `Settings file does not exist: ${resolved}`);
  }
  const source = fs.readFileSync(resolved, "utf8");
  const flat = flattenSections(ini.parse(source), {});
  return resolveSettings({ ...flat, ...rawListValues(source) }, path.dirname(resolved));
};

export const readExportFile = (exportPath: string): unknown => {
  if (!fs.existsSync(exportPath)) {
    throw new FlowCompilerError("EXPORT_NOT_FOUND", `Export file does not exist: ${exportPath}`);
  }
  const source = fs.readFileSync(exportPath, "utf8");
  try {
    return JSON.parse(source.replace(/^\uFEFF/, ""));
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown JSON parse error.";
    throw new FlowCompilerError("EXPORT_INVALID", `Failed to parse export "${exportPath}": ${message}`);
  }
};

/** The Ren'Py `game` directory enclosing `targetDir`, if any. */
export const findGameDir = (targetDir: string): string | null => {
  let current = path.resolve(targetDir);
  while (true) {
    if (path.basename(current) === "game") {
      return current;
    }
    const parent = path.dirname(current);
    if (parent === current) {
      return null;
    }
    current = parent;
  }
};

/**
 * Collects image and audio files under the game directory as posix paths
 * relative to it. Returns undefined when `targetDir` is not inside a game.
 */
export const collectKnownAssets = (targetDir: string): Set<string> | undefined => {
  const gameDir = findGameDir(targetDir);
  if (!gameDir || !fs.existsSync(gameDir)) {
    return undefined;
  }
  const assets = new Set<string>();
  const visit = (relativeDir: string): void => {
    const fullDir = relativeDir ? path.join(gameDir, relativeDir) : gameDir;
    const entries = fs.readdirSync(fullDir, { withFileTypes: true });
    entries.sort((a, b) => a.name.localeCompare(b.name));
    for (const entry of entries) {
      const relativePath = relativeDir ? path.join(relativeDir, entry.name) : entry.name;
      if (entry.isDirectory()) {
        visit(relativePath);
        continue;
      }
      const lower = entry.name.toLowerCase();
      if (entry.isFile() && ASSET_EXTENSIONS.some((extension) => lower.endsWith(extension))) {
        assets.add(toPosixPath(relativePath));
      }
    }
  };
  visit("");
  return assets;
};
