import { FlowCompilerError } from "../core/errors.js";
import type {
  BlockLine,
  CompiledBlock,
  ConverterSettings,
  DirectiveSet,
  FileUnit,
  FlowGraph,
  FlowNode,
} from "../core/types.js";
import { DiagnosticLog } from "../output/log-report.js";
import { PinIndex, jumpTo, statement } from "./branches.js";
import { defaultDirectives, parseDirectives, type ParsedDirectives } from "./directives.js";
import { compileNodeBlock, type NodeCompileContext } from "./nodes.js";

const INDENT = "    ";
const BASE_FILE_HEADER = "# Entry point of the generated flow";
/** A global label, optionally followed by one local `.name`. */
const LABEL_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/;

export interface CompileFlowOptions {
  characterNames?: ReadonlyMap<string, string>;
  knownAssets?: ReadonlySet<string>;
  /** Names already defined elsewhere (characters, variable stores). */
  reservedDefinitions?: Iterable<string>;
}

export interface CompiledFlow {
  /** Relative posix path → script source, base file first. */
  files: Record<string, string>;
  topLevelDirs: string[];
  labels: ReadonlyMap<string, string>;
  log: DiagnosticLog;
}

export const toDirName = (node: FlowNode): string => {
  const name = node.displayName
    .trim()
    .toLowerCase()
    .replace(/\s+/g, "_")
    .replace(/[\\/:]/g, "_");
  return name.length > 0 && name !== "." && name !== ".." ? name : node.id.toLowerCase();
};

class FlowCompilation {
  private readonly labels = new Map<string, string>();
  private readonly skipped = new Set<string>();
  private readonly definitions = new Set<string>();
  private readonly directiveCache = new Map<string, ParsedDirectives>();
  private readonly dirNames = new Map<string, Set<string>>();
  private readonly units: FileUnit[] = [];
  private readonly topLevelDirs: string[] = [];
  private readonly pins: PinIndex;
  private readonly defaults: DirectiveSet;
  readonly log = new DiagnosticLog();

  constructor(
    private readonly graph: FlowGraph,
    private readonly settings: ConverterSettings,
    private readonly options: CompileFlowOptions
  ) {
    this.pins = new PinIndex(graph);
    this.defaults = defaultDirectives(settings);
  }

  run(): CompiledFlow {
    for (const name of this.options.reservedDefinitions ?? []) {
      this.define(name);
    }
    this.define(this.settings.startLabel);
    this.define(this.settings.endLabel);

    const baseUnit = this.openUnit(`${this.settings.filePrefix}${this.settings.baseFileName}`, "", null);
    const startId = this.settings.startNode ?? this.graph.rootIds[0];
    this.append(baseUnit, {
      nodeId: null,
      label: this.settings.startLabel,
      lines: [startId ? jumpTo(1, startId, null) : statement(1, `jump ${this.settings.endLabel}`)],
      jumpTargets: startId ? [startId] : [],
    });
    this.append(baseUnit, {
      nodeId: null,
      label: this.settings.endLabel,
      lines: [statement(1, "return")],
      jumpTargets: [],
    });

    for (const rootId of this.graph.rootIds) {
      const node = this.nodeById(rootId);
      if (!node) {
        continue;
      }
      if (node.kind === "container") {
        this.visitContainer(node, "");
      } else {
        this.compileFrom(node, baseUnit);
      }
    }
    baseUnit.closed = true;

    const files: Record<string, string> = {};
    for (const unit of this.units) {
      const source = this.renderUnit(unit);
      files[unit.path] = unit === baseUnit ? `${BASE_FILE_HEADER}\n${source}` : source;
    }
    return { files, topLevelDirs: [...this.topLevelDirs], labels: this.labels, log: this.log };
  }

  private nodeById = (nodeId: string): FlowNode | undefined =>
    Object.hasOwn(this.graph.nodes, nodeId) ? this.graph.nodes[nodeId] : undefined;

  private parsed(nodeId: string): ParsedDirectives {
    const cached = this.directiveCache.get(nodeId);
    if (cached) {
      return cached;
    }
    const node = this.nodeById(nodeId);
    const parsed = parseDirectives(node?.directives, this.defaults);
    this.directiveCache.set(nodeId, parsed);
    return parsed;
  }

  private define(name: string, nodeId?: string): void {
    if (this.definitions.has(name)) {
      throw new FlowCompilerError(
        "DEFINITION_DUPLICATE",
        nodeId
          ? `Definition "${name}" of node ${nodeId} is already used.`
          : `Definition "${name}" is already used.`,
        nodeId
      );
    }
    this.definitions.add(name);
  }

  private openUnit(path: string, dirPath: string, ownerId: string | null): FileUnit {
    const unit: FileUnit = { path, dirPath, ownerId, blocks: [], closed: false };
    this.units.push(unit);
    return unit;
  }

  private append(unit: FileUnit, block: CompiledBlock): void {
    if (unit.closed) {
      throw new FlowCompilerError("FILE_UNIT_CLOSED", `Cannot add label ${block.label} to closed file ${unit.path}.`);
    }
    unit.blocks.push(block);
  }

  private claimDirName(parentDir: string, node: FlowNode): string {
    let used = this.dirNames.get(parentDir);
    if (!used) {
      used = new Set<string>();
      this.dirNames.set(parentDir, used);
    }
    const base = toDirName(node);
    let name = base;
    for (let count = 1; used.has(name); count += 1) {
      name = `${base}_${count}`;
    }
    used.add(name);
    return name;
  }

  private visitContainer(container: FlowNode, parentDir: string): void {
    const dirName = this.claimDirName(parentDir, container);
    const dirPath = parentDir ? `${parentDir}/${dirName}` : dirName;
    if (!parentDir) {
      this.topLevelDirs.push(dirName);
    }
    const unit = this.openUnit(`${dirPath}/${this.settings.filePrefix}${dirName}.rpy`, dirPath, container.id);
    this.compileFrom(container, unit);
    for (const childId of container.childIds) {
      const child = this.nodeById(childId);
      if (!child) {
        continue;
      }
      if (child.kind === "container") {
        this.visitContainer(child, dirPath);
      } else {
        this.compileFrom(child, unit);
      }
    }
    unit.closed = true;
  }

  private labelFor(node: FlowNode, unit: FileUnit): string {
    const { directives } = this.parsed(node.id);
    const fallback = `${this.settings.labelPrefix}${node.id}`;
    const chosen = directives.label || (node.kind === "entry" ? node.text.trim() : "");
    if (chosen.length === 0) {
      return fallback;
    }
    if (!LABEL_PATTERN.test(chosen)) {
      this.log.add(unit.path, node.id, `label "${chosen}" is not a valid Ren'Py label, using "${fallback}"`);
      return fallback;
    }
    return chosen;
  }

  private contextFor(unit: FileUnit): NodeCompileContext {
    return {
      settings: this.settings,
      unit,
      pins: this.pins,
      characterNames: this.options.characterNames ?? new Map<string, string>(),
      knownAssets: this.options.knownAssets,
      endLabel: this.settings.endLabel,
      nodeById: this.nodeById,
      directivesOf: (nodeId) => this.parsed(nodeId).directives,
      report: (nodeId, message) => this.log.add(unit.path, nodeId, message),
    };
  }

  /**
   * Compiles `start` and, depth-first, every not yet compiled successor owned
   * by the same container. Memoized by node id.
   */
  private compileFrom(start: FlowNode, unit: FileUnit): void {
    const context = this.contextFor(unit);
    const pending: FlowNode[] = [start];
    while (pending.length > 0) {
      const node = pending.pop();
      if (!node || this.labels.has(node.id) || this.skipped.has(node.id)) {
        continue;
      }
      if (node.kind === "comment" || node.kind === "unsupported") {
        this.skipped.add(node.id);
        if (node.kind === "unsupported") {
          this.log.add(unit.path, node.id, `type "${node.typeName}" of node ${node.id} is not supported`);
        }
        continue;
      }

      const label = this.labelFor(node, unit);
      this.define(label, node.id);
      this.labels.set(node.id, label);
      for (const problem of this.parsed(node.id).problems) {
        this.log.add(unit.path, node.id, problem);
      }

      const block = compileNodeBlock(node, label, context);
      this.append(unit, block);

      const successors = block.jumpTargets
        .map((targetId) => this.nodeById(targetId))
        .filter(
          (target): target is FlowNode =>
            target !== undefined && target.kind !== "container" && target.parentId === unit.ownerId
        );
      for (let i = successors.length - 1; i >= 0; i -= 1) {
        pending.push(successors[i]);
      }
    }
  }

  private resolveJump(line: Extract<BlockLine, { kind: "jump" }>, block: CompiledBlock, unit: FileUnit): string {
    const label = this.labels.get(line.targetId);
    if (label) {
      return label;
    }
    const message = `jumps to unknown node "${line.targetId}", will jump to "${this.settings.endLabel}"`;
    if (line.sourceId === null) {
      this.log.add(unit.path, null, `${block.label} ${message}`);
    } else {
      this.log.add(unit.path, line.sourceId, message);
    }
    return this.settings.endLabel;
  }

  private renderUnit(unit: FileUnit): string {
    const blocks = unit.blocks.map((block) => {
      const lines = block.lines.map((line) => {
        const text = line.kind === "jump" ? `jump ${this.resolveJump(line, block, unit)}` : line.text;
        return text.length > 0 ? `${INDENT.repeat(line.indent)}${text}` : "";
      });
      return [`label ${block.label}:`, ...lines].join("\n");
    });
    return `${blocks.join("\n\n")}\n`;
  }
}

/**
 * Linearizes the flow graph into one script file per container plus the base
 * file. Each node is compiled once; later references become jumps.
 */
export const compileFlow = (
  graph: FlowGraph,
  settings: ConverterSettings,
  options: CompileFlowOptions = {}
): CompiledFlow => new FlowCompilation(graph, settings, options).run();
