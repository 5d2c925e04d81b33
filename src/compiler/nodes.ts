import type {
  BlockLine,
  CompiledBlock,
  ConverterSettings,
  DirectiveSet,
  FileUnit,
  FlowNode,
  FlowPin,
} from "../core/types.js";
import {
  compileBranches,
  danglingJump,
  jumpTo,
  statement,
  type BranchContext,
  type PinIndex,
} from "./branches.js";
import {
  escapeSayText,
  renderCodeLine,
  renderSayText,
  splitTextLines,
  toPythonCondition,
  toPythonStatements,
} from "./text.js";

export interface NodeCompileContext extends BranchContext {
  settings: ConverterSettings;
  unit: FileUnit;
  pins: PinIndex;
  characterNames: ReadonlyMap<string, string>;
  knownAssets?: ReadonlySet<string>;
}

const commentLines = (node: FlowNode): BlockLine[] => {
  const lines = [statement(1, `# ${node.typeName}`)];
  const displayName = node.displayName.replace(/\s+/g, " ").trim();
  if (displayName.length > 0) {
    lines.push(statement(1, `# ${displayName}`));
  }
  return lines;
};

const resolveSpeaker = (
  node: FlowNode,
  directives: DirectiveSet,
  context: NodeCompileContext
): string | null => {
  if (directives.speaker) {
    return `"${escapeSayText(directives.speaker)}"`;
  }
  if (!node.speakerId) {
    return null;
  }
  const character = context.characterNames.get(node.speakerId);
  if (!character) {
    context.report(node.id, `speaker "${node.speakerId}" is not a known entity`);
    return null;
  }
  return character;
};

export const sayStatement = (
  line: string,
  speaker: string | null,
  directives: DirectiveSet
): string =>
  [speaker, directives.before, `"${renderSayText(line.trim(), directives.markdown)}"`, directives.after]
    .filter((part): part is string => part !== null && part.length > 0)
    .join(" ");

const sayLines = (text: string, speaker: string | null, directives: DirectiveSet): string[] =>
  splitTextLines(text).map((line) => sayStatement(line, speaker, directives));

const codeLines = (node: FlowNode, directives: DirectiveSet, context: NodeCompileContext): string[] =>
  splitTextLines(node.text).map((line) => {
    const rendered = renderCodeLine(line.trimEnd(), {
      containerDir: context.unit.dirPath,
      relativeImgsInBraces: directives.relativeImgsInBraces,
      knownAssets: context.knownAssets,
      markers: context.settings.beginningsLogLines,
    });
    for (const problem of rendered.problems) {
      context.report(node.id, problem);
    }
    return rendered.line;
  });

const contentLines = (node: FlowNode, directives: DirectiveSet, context: NodeCompileContext): string[] => {
  if (node.kind === "dialogue") {
    return sayLines(node.text, resolveSpeaker(node, directives, context), directives);
  }
  if (node.kind === "code") {
    const lines = codeLines(node, directives, context);
    if (directives.repeatMenuText && node.menuText.trim().length > 0) {
      lines.push(...sayLines(node.menuText, resolveSpeaker(node, directives, context), directives));
    }
    return lines;
  }
  return [];
};

/** Wraps content in the conjunction of the node's input-pin conditions. */
const guardedContent = (node: FlowNode, content: string[]): BlockLine[] => {
  const conditions = node.inputPins
    .map((pin) => toPythonCondition(pin.text))
    .filter((condition) => condition.length > 0);
  if (content.length === 0 || conditions.length === 0) {
    return content.map((line) => statement(1, line));
  }
  const guard =
    conditions.length === 1 ? conditions[0] : conditions.map((condition) => `(${condition})`).join(" and ");
  return [statement(1, `if ${guard}:`), ...content.map((line) => statement(2, line))];
};

const conditionLines = (node: FlowNode, context: NodeCompileContext): BlockLine[] => {
  const [truePin, falsePin] = node.outputPins;
  const branch = (pin: FlowPin | undefined, name: string): BlockLine[] => {
    const [edge] = pin ? context.pins.pinEdges(pin) : [];
    if (!edge) {
      return [danglingJump(node, 2, context, `${name} branch `)];
    }
    const instructions = edge.instructions
      .flatMap((instruction) => toPythonStatements(instruction))
      .map((instruction) => statement(2, `$ ${instruction}`));
    const exit =
      edge.targetId === null ? danglingJump(node, 2, context, `${name} branch `) : jumpTo(2, edge.targetId, node.id);
    return [...instructions, exit];
  };
  const condition = toPythonCondition(node.expression);
  return [
    statement(1, `if ${condition.length > 0 ? condition : "True"}:`),
    ...branch(truePin, "true"),
    statement(1, "else:"),
    ...branch(falsePin, "false"),
  ];
};

const controlFlowLines = (node: FlowNode, context: NodeCompileContext): BlockLine[] => {
  if (node.kind === "condition") {
    return conditionLines(node, context);
  }
  if (node.kind === "jump") {
    return node.jumpTargetId ? [jumpTo(1, node.jumpTargetId, node.id)] : [danglingJump(node, 1, context)];
  }
  const lines: BlockLine[] = [];
  if (node.kind === "instruction") {
    lines.push(...toPythonStatements(node.expression).map((instruction) => statement(1, `$ ${instruction}`)));
  }
  lines.push(...compileBranches(node, context.pins.outgoingEdges(node), 1, context));
  return lines;
};

/**
 * Compiles one node into a labeled block: traceability comments, guarded
 * content, then the control flow leaving the node.
 */
export const compileNodeBlock = (
  node: FlowNode,
  label: string,
  context: NodeCompileContext
): CompiledBlock => {
  const directives = context.directivesOf(node.id);
  const lines: BlockLine[] = [
    ...commentLines(node),
    ...guardedContent(node, contentLines(node, directives, context)),
    ...controlFlowLines(node, context),
  ];
  const jumpTargets: string[] = [];
  for (const line of lines) {
    if (line.kind === "jump" && !jumpTargets.includes(line.targetId)) {
      jumpTargets.push(line.targetId);
    }
  }
  return { nodeId: node.id, label, lines, jumpTargets };
};
