import type { ConverterSettings, DirectiveSet } from "../core/types.js";

type KeysOfType<T, V> = { [K in keyof T]-?: T[K] extends V ? K : never }[keyof T];

type DirectiveOption =
  | { type: "string"; field: KeysOfType<DirectiveSet, string | null> }
  | { type: "int"; field: KeysOfType<DirectiveSet, number | null> }
  | { type: "bool"; field: KeysOfType<DirectiveSet, boolean> };

export interface ParsedDirectives {
  directives: DirectiveSet;
  problems: string[];
}

const DIRECTIVE_REGISTRY: Record<string, DirectiveOption> = {
  label: { type: "string", field: "label" },
  speaker: { type: "string", field: "speaker" },
  before: { type: "string", field: "before" },
  after: { type: "string", field: "after" },
  choice_index: { type: "int", field: "choiceIndex" },
  display_text_box: { type: "bool", field: "displayTextBox" },
  markdown: { type: "bool", field: "markdown" },
  relative_imgs_in_braces: { type: "bool", field: "relativeImgsInBraces" },
  repeat_menu_text: { type: "bool", field: "repeatMenuText" },
};

const INTEGER_PATTERN = /^[+-]?\d+$/;

export const defaultDirectives = (settings: ConverterSettings): DirectiveSet => ({
  label: null,
  speaker: null,
  before: null,
  after: null,
  choiceIndex: null,
  displayTextBox: settings.menuDisplayTextBox,
  markdown: settings.markdownTextStyles,
  relativeImgsInBraces: settings.relativeImgsInBraces,
  repeatMenuText: settings.repeatMenuText,
});

/** Splits on commas outside quotes and brackets. */
export const splitByTopLevelComma = (raw: string): string[] => {
  const parts: string[] = [];
  let current = "";
  let depth = 0;
  let quote: "\"" | "'" | null = null;

  for (let i = 0; i < raw.length; i += 1) {
    const ch = raw[i];
    if (quote) {
      current += ch;
      if (ch === quote && raw[i - 1] !== "\\") {
        quote = null;
      }
      continue;
    }
    if (ch === "\"" || ch === "'") {
      quote = ch;
      current += ch;
      continue;
    }
    if (ch === "(" || ch === "[" || ch === "{") depth += 1;
    if ((ch === ")" || ch === "]" || ch === "}") && depth > 0) depth -= 1;

    if (ch === "," && depth === 0) {
      parts.push(current.trim());
      current = "";
      continue;
    }
    current += ch;
  }
  if (current.trim().length > 0) {
    parts.push(current.trim());
  }
  return parts.filter((part) => part.length > 0);
};

const unquote = (value: string): string => {
  const trimmed = value.trim();
  if (trimmed.length >= 2) {
    const first = trimmed[0];
    if ((first === "\"" || first === "'") && trimmed[trimmed.length - 1] === first) {
      return trimmed.slice(1, -1).replaceAll(`\\${first}`, first);
    }
  }
  return trimmed;
};

const parseBool = (value: string): boolean | null => {
  const normalized = value.toLowerCase();
  if (normalized === "true") {
    return true;
  }
  if (normalized === "false") {
    return false;
  }
  return null;
};

const applyOption = (
  directives: DirectiveSet,
  name: string,
  option: DirectiveOption,
  value: string | null,
  problems: string[]
): void => {
  if (option.type === "string") {
    if (value === null) {
      problems.push(`directive "${name}" expects a value, using the default`);
      return;
    }
    directives[option.field] = value;
    return;
  }
  if (option.type === "int") {
    if (value === null || !INTEGER_PATTERN.test(value)) {
      problems.push(`directive "${name}" expects an integer but got "${value ?? ""}", using the default`);
      return;
    }
    directives[option.field] = Number.parseInt(value, 10);
    return;
  }
  if (value === null) {
    directives[option.field] = true;
    return;
  }
  const parsed = parseBool(value);
  if (parsed === null) {
    problems.push(`directive "${name}" expects True or False but got "${value}", using the default`);
    return;
  }
  directives[option.field] = parsed;
};

/**
 * Resolves a node's raw stage directions on top of `defaults`.
 * Problems are returned for the caller to log; parsing never throws.
 */
export const parseDirectives = (raw: string | null | undefined, defaults: DirectiveSet): ParsedDirectives => {
  const directives: DirectiveSet = { ...defaults };
  const problems: string[] = [];
  if (!raw || raw.trim().length === 0) {
    return { directives, problems };
  }

  for (const segment of splitByTopLevelComma(raw)) {
    if (INTEGER_PATTERN.test(segment)) {
      directives.choiceIndex = Number.parseInt(segment, 10);
      continue;
    }
    const separator = segment.indexOf("=");
    const name = (separator >= 0 ? segment.slice(0, separator) : segment).trim();
    const value = separator >= 0 ? unquote(segment.slice(separator + 1)) : null;
    if (name.length === 0) {
      problems.push(`malformed directive "${segment}" is ignored`);
      continue;
    }
    if (!Object.hasOwn(DIRECTIVE_REGISTRY, name)) {
      problems.push(`unknown directive "${name}" is ignored`);
      continue;
    }
    applyOption(directives, name, DIRECTIVE_REGISTRY[name], value, problems);
  }

  return { directives, problems };
};
