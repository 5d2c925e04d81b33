import { FlowCompilerError } from "../core/errors.js";
import type {
  EntityParamValue,
  FlowConnection,
  FlowEntity,
  FlowGraph,
  FlowNode,
  FlowNodeKind,
  FlowPin,
  VariableNamespace,
} from "../core/types.js";

type JsonRecord = Record<string, unknown>;

export interface ParseExportOptions {
  /** Types compiled as raw Ren'Py code. */
  renpyBoxTypes?: string[];
}

const BASE_KINDS: Record<string, FlowNodeKind> = {
  FlowFragment: "container",
  Dialogue: "container",
  DialogueFragment: "dialogue",
  Hub: "hub",
  Jump: "jump",
  Condition: "condition",
  Instruction: "instruction",
  RenPyEntryPoint: "entry",
  Comment: "comment",
};

const isRecord = (value: unknown): value is JsonRecord =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const invalid = (message: string): FlowCompilerError =>
  new FlowCompilerError("EXPORT_INVALID", message);

const readRecord = (record: JsonRecord, key: string, where: string): JsonRecord => {
  const value = record[key];
  if (!isRecord(value)) {
    throw invalid(`Expected object "${key}" in ${where}.`);
  }
  return value;
};

const readArray = (record: JsonRecord, key: string, where: string, required = false): unknown[] => {
  const value = record[key];
  if (value === undefined && !required) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw invalid(`Expected array "${key}" in ${where}.`);
  }
  return value;
};

const readString = (record: JsonRecord, key: string): string => {
  const value = record[key];
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return "";
};

const readId = (record: JsonRecord, key: string, where: string): string => {
  const value = readString(record, key);
  if (value.length === 0) {
    throw invalid(`Missing "${key}" in ${where}.`);
  }
  return value;
};

const NULL_REFERENCE = /^0x0+$/i;

/** Object references; Articy writes unset ones as an all-zero id. */
const readReference = (record: JsonRecord, key: string): string | null => {
  const value = readString(record, key);
  return value.length === 0 || NULL_REFERENCE.test(value) ? null : value;
};

const records = (values: unknown[], where: string): JsonRecord[] =>
  values.map((value, index) => {
    if (!isRecord(value)) {
      throw invalid(`Expected object at ${where}[${index}].`);
    }
    return value;
  });

const parseConnections = (pin: JsonRecord, where: string): FlowConnection[] =>
  records(readArray(pin, "Connections", where), `${where}.Connections`).map((connection, index) => ({
    label: readString(connection, "Label"),
    targetPinId: readId(connection, "TargetPin", `${where}.Connections[${index}]`),
    targetNodeId: readId(connection, "Target", `${where}.Connections[${index}]`),
  }));

const parsePins = (properties: JsonRecord, key: string, ownerId: string): FlowPin[] =>
  records(readArray(properties, key, `model ${ownerId}`), `model ${ownerId}.${key}`).map((pin, index) => {
    const where = `model ${ownerId}.${key}[${index}]`;
    return {
      id: readId(pin, "Id", where),
      ownerId,
      text: readString(pin, "Text"),
      connections: parseConnections(pin, where),
    };
  });

interface ObjectDefinition {
  inheritsFrom: string;
  className: string;
}

const parseObjectDefinitions = (root: JsonRecord): Map<string, ObjectDefinition> => {
  const definitions = new Map<string, ObjectDefinition>();
  for (const definition of records(readArray(root, "ObjectDefinitions", "export"), "ObjectDefinitions")) {
    const type = readString(definition, "Type");
    if (type.length === 0) {
      continue;
    }
    definitions.set(type, {
      inheritsFrom: readString(definition, "InheritsFrom"),
      className: readString(definition, "Class"),
    });
  }
  return definitions;
};

const baseTypeOf = (type: string, definitions: Map<string, ObjectDefinition>): string => {
  let current = type;
  const seen = new Set<string>();
  while (!Object.hasOwn(BASE_KINDS, current) && current !== "Entity" && !seen.has(current)) {
    seen.add(current);
    const definition = definitions.get(current);
    if (!definition || definition.inheritsFrom.length === 0) {
      break;
    }
    current = definition.inheritsFrom;
  }
  return current;
};

const isEntityType = (type: string, definitions: Map<string, ObjectDefinition>): boolean =>
  type === "Entity" ||
  definitions.get(type)?.className === "Entity" ||
  baseTypeOf(type, definitions) === "Entity";

const parseFeatures = (model: JsonRecord): Record<string, Record<string, EntityParamValue>> => {
  const template = model.Template;
  if (!isRecord(template)) {
    return {};
  }
  const features: Record<string, Record<string, EntityParamValue>> = {};
  for (const [featureName, feature] of Object.entries(template)) {
    if (!isRecord(feature)) {
      continue;
    }
    const properties: Record<string, EntityParamValue> = {};
    for (const [property, value] of Object.entries(feature)) {
      if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
        properties[property] = value;
      }
    }
    features[featureName] = properties;
  }
  return features;
};

const parseNamespaces = (root: JsonRecord): VariableNamespace[] =>
  records(readArray(root, "GlobalVariables", "export"), "GlobalVariables").map((namespace, index) => {
    const where = `GlobalVariables[${index}]`;
    return {
      name: readId(namespace, "Namespace", where),
      description: readString(namespace, "Description"),
      variables: records(readArray(namespace, "Variables", where), `${where}.Variables`).map(
        (variable, variableIndex) => ({
          name: readId(variable, "Variable", `${where}.Variables[${variableIndex}]`),
          type: readString(variable, "Type"),
          value: readString(variable, "Value"),
          description: readString(variable, "Description"),
        })
      ),
    };
  });

const findFlowHierarchy = (root: JsonRecord): JsonRecord | null => {
  const hierarchy = root.Hierarchy;
  if (!isRecord(hierarchy)) {
    return null;
  }
  for (const child of records(readArray(hierarchy, "Children", "Hierarchy"), "Hierarchy.Children")) {
    if (readString(child, "Type") === "Flow") {
      return child;
    }
  }
  return null;
};

/**
 * Converts a parsed Articy JSON export into a flow graph. Containers own their
 * children in model order; connections stay a separate relation by id.
 */
export const parseArticyExport = (json: unknown, options: ParseExportOptions = {}): FlowGraph => {
  if (!isRecord(json)) {
    throw invalid("Export root must be an object.");
  }
  const packages = records(readArray(json, "Packages", "export", true), "Packages");
  if (packages.length === 0) {
    throw invalid("Export contains no packages.");
  }
  const models = records(readArray(packages[0], "Models", "Packages[0]", true), "Packages[0].Models");
  const definitions = parseObjectDefinitions(json);
  const renpyBoxTypes = new Set(options.renpyBoxTypes ?? ["RenPyBox"]);

  const nodes: Record<string, FlowNode> = {};
  const entities: FlowEntity[] = [];
  const order: string[] = [];

  for (let i = 0; i < models.length; i += 1) {
    const model = models[i];
    const type = readId(model, "Type", `Packages[0].Models[${i}]`);
    const properties = readRecord(model, "Properties", `Packages[0].Models[${i}]`);
    const id = readId(properties, "Id", `Packages[0].Models[${i}].Properties`);

    if (isEntityType(type, definitions)) {
      entities.push({
        id,
        displayName: readString(properties, "DisplayName"),
        typeName: type,
        features: parseFeatures(model),
      });
      continue;
    }

    const baseType = baseTypeOf(type, definitions);
    const kind: FlowNodeKind = renpyBoxTypes.has(type)
      ? "code"
      : Object.hasOwn(BASE_KINDS, baseType)
        ? BASE_KINDS[baseType]
        : "unsupported";
    const hasPins = Array.isArray(properties.InputPins) || Array.isArray(properties.OutputPins);
    if (kind === "unsupported" && !hasPins) {
      // Not a flow object (locations, documents, assets).
      continue;
    }

    const parentId = readReference(properties, "Parent");
    nodes[id] = {
      id,
      kind,
      typeName: type,
      parentId,
      displayName: readString(properties, "DisplayName"),
      childIds: [],
      inputPins: parsePins(properties, "InputPins", id),
      outputPins: parsePins(properties, "OutputPins", id),
      speakerId: readReference(properties, "Speaker"),
      text: readString(properties, "Text"),
      menuText: readString(properties, "MenuText"),
      directives: readString(properties, "StageDirections"),
      expression: readString(properties, "Expression"),
      jumpTargetId: readReference(properties, "Target"),
    };
    order.push(id);
  }

  const rootIds: string[] = [];
  const flow = findFlowHierarchy(json);
  const flowId = flow ? readString(flow, "Id") : "";
  for (const id of order) {
    const node = nodes[id];
    if (node.parentId !== null && node.parentId !== flowId && Object.hasOwn(nodes, node.parentId)) {
      nodes[node.parentId].childIds.push(id);
      continue;
    }
    node.parentId = null;
    rootIds.push(id);
  }

  if (flow) {
    // The hierarchy carries the author's ordering of top-level objects.
    const hierarchyOrder = records(readArray(flow, "Children", "Flow hierarchy"), "Flow hierarchy.Children")
      .map((child) => readString(child, "Id"))
      .filter((id) => rootIds.includes(id));
    const rest = rootIds.filter((id) => !hierarchyOrder.includes(id));
    rootIds.splice(0, rootIds.length, ...hierarchyOrder, ...rest);
  }

  return { nodes, rootIds, entities, namespaces: parseNamespaces(json) };
};
