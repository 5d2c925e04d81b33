import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import { test } from "vitest";

import { compileProject, convertProject } from "../../src/api.js";
import { readExportFile } from "../../src/cli/core/source-loader.js";
import { parseArticyExport } from "../../src/compiler/export.js";
import { FlowCompilerError } from "../../src/core/errors.js";
import { createSettings } from "../../src/core/settings.js";
import { DEMO_CHAPTER, DEMO_DIR, DEMO_LOG, copyDemo } from "../support/demo.js";

const demoGraph = () => parseArticyExport(readExportFile(path.join(DEMO_DIR, "articy_export.json")));

const readTree = (dir: string): Record<string, string> => {
  const files: Record<string, string> = {};
  for (const entry of fs.readdirSync(dir, { recursive: true, encoding: "utf8" }).sort()) {
    const fullPath = path.join(dir, entry);
    if (fs.statSync(fullPath).isFile()) {
      files[entry.split(path.sep).join("/")] = fs.readFileSync(fullPath, "utf8");
    }
  }
  return files;
};

test("compileProject produces scripts, definitions and the log", () => {
  const result = compileProject({ graph: demoGraph(), settings: createSettings() });

  assert.deepEqual(Object.keys(result.files), [
    "articy_start.rpy",
    "chapter_1/articy_chapter_1.rpy",
    "articy_variables.rpy",
    "articy_characters.rpy",
    "articy_log.txt",
  ]);
  assert.equal(result.files["chapter_1/articy_chapter_1.rpy"], DEMO_CHAPTER);
  assert.equal(result.files["articy_log.txt"], DEMO_LOG);
  assert.equal(
    result.files["articy_characters.rpy"],
    'define character.alice = Character("Alice", color="#c8ffc8", what_italic=False)\n' +
      'define character.narrator = Character("Narrator")\n'
  );
  assert.equal(
    result.files["articy_variables.rpy"],
    [
      "init python in story:",
      "    # Story state",
      "    # Set after the first talk",
      "    met_alice = False",
      "    coins = 3",
      '    nickname = "Al"',
      "",
    ].join("\n")
  );
  assert.equal(result.diagnostics.length, 2);
  assert.deepEqual(result.topLevelDirs, ["chapter_1"]);
});

test("labels may not reuse character or store names", () => {
  const graph = demoGraph();
  graph.nodes["0x0050"].directives = "label=story";
  assert.throws(
    () => compileProject({ graph, settings: createSettings() }),
    (error: unknown) => error instanceof FlowCompilerError && error.code === "DEFINITION_DUPLICATE"
  );
});

test("convertProject writes the tree and is repeatable", () => {
  const demo = copyDemo("api-convert");
  const target = path.join(demo, "game", "articy");

  const first = convertProject({ settingsPath: path.join(demo, "config.ini") });
  assert.equal(first.decision.action, "create");
  assert.equal(first.settings.targetDir, target);
  const written = readTree(target);
  assert.deepEqual(Object.keys(written), [
    "articy_characters.rpy",
    "articy_log.txt",
    "articy_start.rpy",
    "articy_variables.rpy",
    "chapter_1/articy_chapter_1.rpy",
  ]);
  assert.equal(written["chapter_1/articy_chapter_1.rpy"], DEMO_CHAPTER);

  const second = convertProject({ settingsPath: path.join(demo, "config.ini") });
  assert.equal(second.decision.action, "replace");
  assert.deepEqual(readTree(target), written);
});

test("convertProject refuses to clear a directory it did not generate", () => {
  const demo = copyDemo("api-abort");
  const target = path.join(demo, "game", "articy");
  fs.mkdirSync(target, { recursive: true });
  fs.writeFileSync(path.join(target, "notes.txt"), "keep me");

  assert.throws(
    () => convertProject({ settingsPath: path.join(demo, "config.ini") }),
    (error: unknown) => error instanceof FlowCompilerError && error.code === "OUTPUT_UNEXPECTED_CONTENT"
  );
  assert.deepEqual(readTree(target), { "notes.txt": "keep me" });
});
