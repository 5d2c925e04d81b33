import { FlowCompilerError } from "../core/errors.js";
import type {
  BlockLine,
  DirectiveSet,
  FlowConnection,
  FlowGraph,
  FlowNode,
  FlowPin,
} from "../core/types.js";
import { renderSayText, splitTextLines, toPythonCondition, toPythonStatements } from "./text.js";

export interface FlowEdge {
  /** Null when the path ends on a container exit with no onward connection. */
  targetId: string | null;
  label: string;
  /** Output-pin instructions collected on the way to the target. */
  instructions: string[];
  /** Condition of the target's input pin. */
  condition: string;
}

export interface BranchContext {
  endLabel: string;
  nodeById: (nodeId: string) => FlowNode | undefined;
  directivesOf: (nodeId: string) => DirectiveSet;
  report: (nodeId: string | null, message: string) => void;
}

interface PinEntry {
  pin: FlowPin;
  direction: "input" | "output";
}

export const statement = (indent: number, text: string): BlockLine => ({
  kind: "statement",
  indent,
  text,
});

export const jumpTo = (indent: number, targetId: string, sourceId: string | null): BlockLine => ({
  kind: "jump",
  indent,
  targetId,
  sourceId,
});

/**
 * Resolves connections to the nodes they reach. A connection ending on an
 * output pin (a container's exit) continues along that pin's connections.
 */
export class PinIndex {
  private readonly pins = new Map<string, PinEntry>();

  constructor(graph: FlowGraph) {
    for (const node of Object.values(graph.nodes)) {
      for (const pin of node.inputPins) {
        this.pins.set(pin.id, { pin, direction: "input" });
      }
      for (const pin of node.outputPins) {
        this.pins.set(pin.id, { pin, direction: "output" });
      }
    }
  }

  pinEdges(pin: FlowPin): FlowEdge[] {
    const seen = new Set<string>([pin.id]);
    return pin.connections.flatMap((connection) =>
      this.resolveConnection(connection, connection.label, [pin.text], seen)
    );
  }

  outgoingEdges(node: FlowNode): FlowEdge[] {
    const entersContent =
      node.kind === "container" && node.inputPins.some((pin) => pin.connections.length > 0);
    const pins = entersContent ? node.inputPins : node.outputPins;
    const edges: FlowEdge[] = [];
    const targets = new Set<string>();
    let leavesFlow = false;
    for (const pin of pins) {
      for (const edge of this.pinEdges(pin)) {
        if (edge.targetId === null) {
          if (!leavesFlow) {
            leavesFlow = true;
            edges.push(edge);
          }
          continue;
        }
        if (targets.has(edge.targetId)) {
          continue;
        }
        targets.add(edge.targetId);
        edges.push(edge);
      }
    }
    return edges;
  }

  private resolveConnection(
    connection: FlowConnection,
    label: string,
    instructions: string[],
    seen: Set<string>
  ): FlowEdge[] {
    const entry = this.pins.get(connection.targetPinId);
    if (!entry) {
      return [{ targetId: connection.targetNodeId, label, instructions, condition: "" }];
    }
    if (entry.direction === "input") {
      return [{ targetId: entry.pin.ownerId, label, instructions, condition: entry.pin.text }];
    }
    if (seen.has(entry.pin.id)) {
      return [];
    }
    seen.add(entry.pin.id);
    if (entry.pin.connections.length === 0) {
      return [{ targetId: null, label, instructions: [...instructions, entry.pin.text], condition: "" }];
    }
    return entry.pin.connections.flatMap((next) =>
      this.resolveConnection(next, next.label || label, [...instructions, entry.pin.text], seen)
    );
  }
}

/**
 * Choice text precedence: menu text, then connection label, then primary text.
 */
export const resolveChoiceText = (target: FlowNode, edge: FlowEdge): string => {
  if (target.menuText.trim().length > 0) {
    return target.menuText;
  }
  if (edge.label.trim().length > 0) {
    return edge.label;
  }
  if (target.text.trim().length > 0) {
    return target.text;
  }
  throw new FlowCompilerError(
    "CHOICE_TEXT_MISSING",
    `Node ${target.id} is a menu choice but has no menu text, connection label or text.`,
    target.id
  );
};

/** Stable sort by `choice_index`; branches without one keep discovery order at the end. */
export const orderBranches = (
  edges: FlowEdge[],
  directivesOf: (nodeId: string) => DirectiveSet
): FlowEdge[] =>
  edges
    .map((edge, position) => ({
      edge,
      position,
      index: edge.targetId === null ? null : directivesOf(edge.targetId).choiceIndex,
    }))
    .sort((a, b) => {
      if (a.index !== null && b.index !== null && a.index !== b.index) {
        return a.index - b.index;
      }
      if (a.index !== null && b.index === null) {
        return -1;
      }
      if (a.index === null && b.index !== null) {
        return 1;
      }
      return a.position - b.position;
    })
    .map((entry) => entry.edge);

const instructionLines = (edge: FlowEdge, indent: number): BlockLine[] =>
  edge.instructions
    .flatMap((instruction) => toPythonStatements(instruction))
    .map((instruction) => statement(indent, `$ ${instruction}`));

export const danglingJump = (
  node: FlowNode,
  indent: number,
  context: BranchContext,
  subject = ""
): BlockLine => {
  context.report(
    node.id,
    `${subject}was not assigned any jump target in Articy, will jump to "${context.endLabel}"`
  );
  return statement(indent, `jump ${context.endLabel}`);
};

const menuLines = (
  node: FlowNode,
  edges: FlowEdge[],
  directives: DirectiveSet,
  indent: number,
  context: BranchContext
): BlockLine[] => {
  const lines: BlockLine[] = [statement(indent, "menu:")];
  if (directives.displayTextBox) {
    lines.push(statement(indent + 1, "extend \"\""));
  }
  for (const edge of orderBranches(edges, context.directivesOf)) {
    if (edge.targetId === null) {
      const text = edge.label.trim();
      if (text.length === 0) {
        throw new FlowCompilerError(
          "CHOICE_TEXT_MISSING",
          `Node ${node.id} has a branch leaving the flow without a connection label.`,
          node.id
        );
      }
      lines.push(statement(indent + 1, `"${renderSayText(text, directives.markdown)}":`));
      lines.push(...instructionLines(edge, indent + 2));
      lines.push(danglingJump(node, indent + 2, context, `choice "${text}" `));
      continue;
    }
    const target = context.nodeById(edge.targetId);
    if (!target) {
      throw new FlowCompilerError(
        "CHOICE_TARGET_MISSING",
        `Node ${node.id} branches to unknown node ${edge.targetId}.`,
        node.id
      );
    }
    const text = splitTextLines(resolveChoiceText(target, edge))
      .map((line) => line.trim())
      .join(" ");
    const condition = toPythonCondition(edge.condition);
    const guard = condition.length > 0 ? ` if ${condition}` : "";
    const { markdown } = context.directivesOf(edge.targetId);
    lines.push(statement(indent + 1, `"${renderSayText(text, markdown)}"${guard}:`));
    lines.push(...instructionLines(edge, indent + 2));
    lines.push(jumpTo(indent + 2, edge.targetId, node.id));
  }
  return lines;
};

/**
 * Emits the control flow leaving `node`: a fallthrough jump, the end-label
 * fallback, or a choice menu.
 */
export const compileBranches = (
  node: FlowNode,
  edges: FlowEdge[],
  indent: number,
  context: BranchContext
): BlockLine[] => {
  if (edges.length === 0) {
    return [danglingJump(node, indent, context)];
  }
  if (edges.length === 1) {
    const [edge] = edges;
    const exit =
      edge.targetId === null ? danglingJump(node, indent, context) : jumpTo(indent, edge.targetId, node.id);
    return [...instructionLines(edge, indent), exit];
  }
  return menuLines(node, edges, context.directivesOf(node.id), indent, context);
};
