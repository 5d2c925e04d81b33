#!/usr/bin/env node

import path from "node:path";
import { fileURLToPath } from "node:url";

import { convertProject } from "../api.js";
import { FlowCompilerError } from "../core/errors.js";
import { DEFAULT_SETTINGS_FILE } from "./core/source-loader.js";

type WriteLine = (line: string) => void;

const usage = [
  "renpy-flow-compiler",
  `  [settings.ini]   compile the configured Articy export (default: ${DEFAULT_SETTINGS_FILE})`,
  "  --help           show this message",
].join("\n");

const stdoutLine: WriteLine = (line) => {
  process.stdout.write(`${line}\n`);
};

const stderrLine: WriteLine = (line) => {
  process.stderr.write(`${line}\n`);
};

const resolveSettingsArg = (argv: string[]): string => {
  if (argv.length > 1) {
    throw new FlowCompilerError("CLI_ARG_FORMAT", `Unexpected argument: ${argv[1]}`);
  }
  const [settingsArg] = argv;
  if (settingsArg === undefined) {
    return DEFAULT_SETTINGS_FILE;
  }
  if (settingsArg.startsWith("-")) {
    throw new FlowCompilerError("CLI_ARG_FORMAT", `Unknown option: ${settingsArg}`);
  }
  return settingsArg;
};

export const runConverterCli = (
  argv: string[],
  writeLine: WriteLine = stdoutLine,
  writeError: WriteLine = stderrLine
): number => {
  if (argv[0] === "--help" || argv[0] === "-h") {
    writeLine(usage);
    return 0;
  }
  try {
    const result = convertProject({ settingsPath: resolveSettingsArg(argv) });
    const { settings } = result;
    writeLine("RESULT:OK");
    writeLine(`TARGET:${settings.targetDir}`);
    writeLine(`FILES:${Object.keys(result.files).length}`);
    writeLine(`DIAGNOSTICS:${result.diagnostics.length}`);
    writeLine(`LOG:${path.join(settings.targetDir, `${settings.filePrefix}${settings.logFileName}`)}`);
    return 0;
  } catch (error) {
    const code = error instanceof FlowCompilerError ? error.code : "CLI_ERROR";
    const message = error instanceof Error ? error.message : "Unknown CLI error.";
    writeLine("RESULT:ERROR");
    writeError(`${code}: ${message}`);
    return 1;
  }
};

const currentPath = fileURLToPath(import.meta.url);
const entryPath = process.argv[1] ? path.resolve(process.argv[1]) : "";

/* v8 ignore next 3 */
if (entryPath && currentPath === entryPath) {
  process.exitCode = runConverterCli(process.argv.slice(2));
}
