import { collectKnownAssets, loadSettingsFile, readExportFile } from "./cli/core/source-loader.js";
import { buildCharacterDefinitions, buildVariableDefinitions } from "./compiler/definitions.js";
import { compileFlow } from "./compiler/compiler.js";
import { parseArticyExport } from "./compiler/export.js";
import type { ConverterSettings, Diagnostic, FlowGraph } from "./core/types.js";
import { renderLogReport } from "./output/log-report.js";
import { reconcileOutput, type ReconcileDecision } from "./output/reconciler.js";

export interface CompileProjectOptions {
  graph: FlowGraph;
  settings: ConverterSettings;
  /** Asset paths relative to the game directory; omit to skip asset checks. */
  knownAssets?: ReadonlySet<string>;
}

export interface CompileProjectResult {
  /** Relative posix path → file content, including definitions and the log. */
  files: Record<string, string>;
  diagnostics: readonly Diagnostic[];
  topLevelDirs: string[];
}

export const compileProject = (options: CompileProjectOptions): CompileProjectResult => {
  const { graph, settings } = options;
  const characters = buildCharacterDefinitions(graph.entities, settings);
  const variables = buildVariableDefinitions(graph.namespaces);

  const compiled = compileFlow(graph, settings, {
    characterNames: characters.names,
    knownAssets: options.knownAssets,
    reservedDefinitions: [...characters.names.values(), ...variables.stores],
  });

  const files: Record<string, string> = { ...compiled.files };
  files[`${settings.filePrefix}${settings.variablesFileName}`] = variables.source;
  files[`${settings.filePrefix}${settings.charactersFileName}`] = characters.source;
  files[`${settings.filePrefix}${settings.logFileName}`] = renderLogReport(
    compiled.log.diagnostics,
    (nodeId) => compiled.labels.get(nodeId)
  );

  return { files, diagnostics: compiled.log.diagnostics, topLevelDirs: compiled.topLevelDirs };
};

export interface ConvertProjectResult extends CompileProjectResult {
  settings: ConverterSettings;
  decision: ReconcileDecision;
}

/** Loads settings and the export, compiles, then replaces the target directory. */
export const convertProject = (options: { settingsPath: string }): ConvertProjectResult => {
  const settings = loadSettingsFile(options.settingsPath);
  const graph = parseArticyExport(readExportFile(settings.articyJsonPath), {
    renpyBoxTypes: settings.renpyBox,
  });
  const compiled = compileProject({
    graph,
    settings,
    knownAssets: collectKnownAssets(settings.targetDir),
  });
  const decision = reconcileOutput(settings.targetDir, compiled.files, {
    filePrefix: settings.filePrefix,
    expectedDirs: new Set(compiled.topLevelDirs),
  });
  return { ...compiled, settings, decision };
};
