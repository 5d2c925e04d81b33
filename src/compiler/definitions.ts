import { FlowCompilerError } from "../core/errors.js";
import type {
  ConverterSettings,
  EntityParamValue,
  FlowEntity,
  FlowVariable,
  VariableNamespace,
} from "../core/types.js";

const INDENT = "    ";
const INTEGER_PATTERN = /^[+-]?\d+$/;

export interface CharacterDefinitions {
  /** Entity id → Ren'Py character token, e.g. `character.alice`. */
  names: Map<string, string>;
  source: string;
}

export interface VariableDefinitions {
  stores: string[];
  source: string;
}

export const toPythonString = (value: string): string =>
  `"${value.replace(/\\/g, "\\\\").replace(/"/g, "\\\"").replace(/\r?\n/g, "\\n")}"`;

const toPythonValue = (value: EntityParamValue): string => {
  if (typeof value === "boolean") {
    return value ? "True" : "False";
  }
  if (typeof value === "number") {
    return String(value);
  }
  return toPythonString(value);
};

const commentLines = (text: string, indent: string): string[] =>
  text
    .split(/\r?\n/)
    .filter((line) => line.trim().length > 0)
    .map((line) => `${indent}# ${line.trim()}`);

const baseCharacterName = (displayName: string): string => {
  const [firstWord = ""] = displayName.trim().split(/\s+/);
  const name = firstWord.toLowerCase().replace(/[^\p{L}\p{N}_]/gu, "");
  return name.length > 0 ? name : "entity";
};

const freeName = (candidate: string, used: Set<string>): string => {
  if (!used.has(candidate)) {
    return candidate;
  }
  let count = 1;
  while (used.has(`${candidate}_${count}`)) {
    count += 1;
  }
  return `${candidate}_${count}`;
};

/**
 * Builds one `define` per entity. Properties of the configured character
 * features become `Character(...)` keyword arguments.
 */
export const buildCharacterDefinitions = (
  entities: FlowEntity[],
  settings: ConverterSettings
): CharacterDefinitions => {
  const names = new Map<string, string>();
  const used = new Set<string>();
  const lines: string[] = [];

  for (const entity of entities) {
    const name = freeName(`${settings.characterPrefix}${baseCharacterName(entity.displayName)}`, used);
    used.add(name);
    names.set(entity.id, name);

    let shownName = entity.displayName;
    const params: string[] = [];
    for (const feature of settings.featuresRenpyCharacterParams) {
      const properties = entity.features[feature];
      if (!properties) {
        continue;
      }
      for (const [property, value] of Object.entries(properties)) {
        if (property === settings.renpyCharacterName) {
          if (typeof value === "string" && value.trim().length > 0) {
            shownName = value;
          }
          continue;
        }
        if (value === "") {
          continue;
        }
        params.push(`${property}=${toPythonValue(value)}`);
      }
    }
    lines.push(`define ${name} = Character(${[toPythonString(shownName), ...params].join(", ")})`);
  }

  return { names, source: lines.length > 0 ? `${lines.join("\n")}\n` : "" };
};

const variableValue = (namespace: string, variable: FlowVariable): string => {
  const raw = variable.value.trim();
  if (variable.type === "Boolean") {
    const normalized = raw.toLowerCase();
    if (normalized === "true" || normalized === "false") {
      return normalized === "true" ? "True" : "False";
    }
  } else if (variable.type === "Integer") {
    if (INTEGER_PATTERN.test(raw)) {
      return String(Number.parseInt(raw, 10));
    }
  } else if (variable.type === "String") {
    return toPythonString(variable.value);
  } else {
    throw new FlowCompilerError(
      "VARIABLE_TYPE_UNSUPPORTED",
      `Variable ${namespace}.${variable.name} has unsupported type "${variable.type}".`
    );
  }
  throw new FlowCompilerError(
    "VARIABLE_VALUE_INVALID",
    `Variable ${namespace}.${variable.name} has invalid ${variable.type} value "${variable.value}".`
  );
};

export const storeName = (namespace: string): string =>
  namespace.length > 0 ? `${namespace[0].toLowerCase()}${namespace.slice(1)}` : namespace;

export const buildVariableDefinitions = (namespaces: VariableNamespace[]): VariableDefinitions => {
  const stores: string[] = [];
  const sections: string[] = [];

  for (const namespace of namespaces) {
    const store = storeName(namespace.name);
    stores.push(store);
    const lines = [`init python in ${store}:`, ...commentLines(namespace.description, INDENT)];
    for (const variable of namespace.variables) {
      lines.push(...commentLines(variable.description, INDENT));
      lines.push(`${INDENT}${variable.name} = ${variableValue(namespace.name, variable)}`);
    }
    if (namespace.variables.length === 0) {
      lines.push(`${INDENT}pass`);
    }
    sections.push(lines.join("\n"));
  }

  return { stores, source: sections.length > 0 ? `${sections.join("\n\n")}\n` : "" };
};
