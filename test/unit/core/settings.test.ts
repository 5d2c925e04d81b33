import assert from "node:assert/strict";
import path from "node:path";
import { test } from "vitest";

import { FlowCompilerError } from "../../../src/core/errors.js";
import { DEFAULT_SETTINGS, resolveSettings, splitList } from "../../../src/core/settings.js";

const baseDir = path.resolve("/projects/demo");
const paths = { path_articy_json: "export/articy.json", path_target_dir: "game/articy" };

const isCode = (code: string) => (error: unknown) => error instanceof FlowCompilerError && error.code === code;

test("required paths resolve against the settings directory", () => {
  const settings = resolveSettings(paths, baseDir);
  assert.equal(settings.articyJsonPath, path.join(baseDir, "export", "articy.json"));
  assert.equal(settings.targetDir, path.join(baseDir, "game", "articy"));
  assert.equal(settings.filePrefix, DEFAULT_SETTINGS.filePrefix);
  assert.deepEqual(settings.beginningsLogLines, ["# todo", "#todo"]);
  assert.equal(settings.startNode, null);
});

test("typed keys override defaults", () => {
  const settings = resolveSettings(
    {
      ...paths,
      file_prefix: "gen_",
      end_label: "finish",
      menu_display_text_box: "False",
      markdown_text_styles: true,
      beginnings_log_lines: "# fixme, ; check",
      renpy_box: "RenPyBox, RawCode",
      start_node: "0x0100",
    },
    baseDir
  );
  assert.equal(settings.filePrefix, "gen_");
  assert.equal(settings.endLabel, "finish");
  assert.equal(settings.menuDisplayTextBox, false);
  assert.equal(settings.markdownTextStyles, true);
  assert.deepEqual(settings.beginningsLogLines, ["# fixme", "; check"]);
  assert.deepEqual(settings.renpyBox, ["RenPyBox", "RawCode"]);
  assert.equal(settings.startNode, "0x0100");
});

test("defaults are not shared between resolved settings", () => {
  const first = resolveSettings(paths, baseDir);
  first.renpyBox.push("Extra");
  assert.deepEqual(resolveSettings(paths, baseDir).renpyBox, ["RenPyBox"]);
});

test("invalid configuration is fatal", () => {
  assert.throws(() => resolveSettings({ ...paths, colour: "red" }, baseDir), isCode("CONFIG_UNKNOWN_KEY"));
  assert.throws(() => resolveSettings({ ...paths, constructor: "x" }, baseDir), isCode("CONFIG_UNKNOWN_KEY"));
  assert.throws(() => resolveSettings({ ...paths, repeat_menu_text: "yes" }, baseDir), isCode("CONFIG_INVALID_VALUE"));
  assert.throws(() => resolveSettings({ path_target_dir: "game" }, baseDir), isCode("CONFIG_MISSING_KEY"));
  assert.throws(() => resolveSettings({ path_articy_json: "a.json" }, baseDir), isCode("CONFIG_MISSING_KEY"));
});

test("splitList trims and drops empty items", () => {
  assert.deepEqual(splitList(" a, ,b ,"), ["a", "b"]);
});
