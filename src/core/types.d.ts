export type FlowNodeKind =
  | "container"
  | "dialogue"
  | "code"
  | "hub"
  | "jump"
  | "condition"
  | "instruction"
  | "entry"
  | "comment"
  | "unsupported";

export interface FlowConnection {
  label: string;
  targetPinId: string;
  targetNodeId: string;
}

export interface FlowPin {
  id: string;
  ownerId: string;
  /** Condition on input pins, instruction on output pins. */
  text: string;
  connections: FlowConnection[];
}

export interface FlowNode {
  id: string;
  kind: FlowNodeKind;
  typeName: string;
  parentId: string | null;
  displayName: string;
  childIds: string[];
  inputPins: FlowPin[];
  outputPins: FlowPin[];
  speakerId: string | null;
  text: string;
  menuText: string;
  directives: string;
  expression: string;
  jumpTargetId: string | null;
}

export type EntityParamValue = string | number | boolean;

export interface FlowEntity {
  id: string;
  displayName: string;
  typeName: string;
  features: Record<string, Record<string, EntityParamValue>>;
}

export interface FlowVariable {
  name: string;
  type: string;
  value: string;
  description: string;
}

export interface VariableNamespace {
  name: string;
  description: string;
  variables: FlowVariable[];
}

export interface FlowGraph {
  nodes: Record<string, FlowNode>;
  rootIds: string[];
  entities: FlowEntity[];
  namespaces: VariableNamespace[];
}

export interface ConverterSettings {
  articyJsonPath: string;
  targetDir: string;
  filePrefix: string;
  baseFileName: string;
  variablesFileName: string;
  charactersFileName: string;
  logFileName: string;
  characterPrefix: string;
  labelPrefix: string;
  startLabel: string;
  endLabel: string;
  startNode: string | null;
  menuDisplayTextBox: boolean;
  markdownTextStyles: boolean;
  relativeImgsInBraces: boolean;
  beginningsLogLines: string[];
  repeatMenuText: boolean;
  featuresRenpyCharacterParams: string[];
  renpyCharacterName: string;
  renpyBox: string[];
}

export interface DirectiveSet {
  label: string | null;
  speaker: string | null;
  before: string | null;
  after: string | null;
  choiceIndex: number | null;
  displayTextBox: boolean;
  markdown: boolean;
  relativeImgsInBraces: boolean;
  repeatMenuText: boolean;
}

export interface Diagnostic {
  file: string;
  nodeId: string | null;
  message: string;
}

export type BlockLine =
  | { kind: "statement"; indent: number; text: string }
  | { kind: "jump"; indent: number; targetId: string; sourceId: string | null };

export interface CompiledBlock {
  nodeId: string | null;
  label: string;
  lines: BlockLine[];
  jumpTargets: string[];
}

export interface FileUnit {
  path: string;
  dirPath: string;
  ownerId: string | null;
  blocks: CompiledBlock[];
  closed: boolean;
}
