import assert from "node:assert/strict";
import { test } from "vitest";

import {
  applyEmphasis,
  escapeSayText,
  findAssetReferences,
  inferBracedImagePaths,
  isMarkerLine,
  renderCodeLine,
  renderSayText,
  splitTextLines,
  toPythonExpression,
  toPythonStatements,
} from "../../../src/compiler/text.js";

test("splitTextLines drops blank lines", () => {
  assert.deepEqual(splitTextLines("one\r\n\n  \ntwo"), ["one", "two"]);
});

test("escapeSayText escapes quotes and percent signs", () => {
  assert.equal(escapeSayText(`He said "hi" 100% it's`), String.raw`He said \"hi\" 100\% it\'s`);
});

test("applyEmphasis converts paired markers", () => {
  assert.equal(applyEmphasis("**bold** and *it* and _under_"), "{b}bold{/b} and {i}it{/i} and {u}under{/u}");
  assert.equal(applyEmphasis("**bold _inner_**"), "{b}bold {u}inner{/u}{/b}");
  assert.equal(applyEmphasis("a * b"), "a * b");
});

test("applyEmphasis leaves interpolations untouched", () => {
  assert.equal(applyEmphasis("[player_*name*] is *here*"), "[player_*name*] is {i}here{/i}");
});

test("renderSayText escapes before emphasis", () => {
  assert.equal(renderSayText('*"x"*', true), String.raw`{i}\"x\"{/i}`);
  assert.equal(renderSayText("*x*", false), "*x*");
});

test("inferBracedImagePaths resolves against the container directory", () => {
  assert.equal(inferBracedImagePaths("show {bg.png}", "chapter_1/scene"), "show 'images/chapter_1/scene/bg.png'");
  assert.equal(inferBracedImagePaths("show {../../../x.png}", "a/b"), "show 'images/x.png'");
  assert.equal(inferBracedImagePaths("show {bg.png}", ""), "show 'images/bg.png'");
  assert.equal(inferBracedImagePaths("$ d = {name}", "a"), "$ d = {name}");
});

test("findAssetReferences matches quoted image and audio paths", () => {
  assert.deepEqual(findAssetReferences(`play music "audio/theme.OGG"; show 'bg.png' and "notes.txt"`), [
    "audio/theme.OGG",
    "bg.png",
  ]);
});

test("isMarkerLine compares lower-cased, left-trimmed lines", () => {
  assert.equal(isMarkerLine("   # TODO later", ["# todo"]), true);
  assert.equal(isMarkerLine("$ x = 1 # todo", ["# todo"]), false);
  assert.equal(isMarkerLine("anything", [""]), false);
});

test("renderCodeLine reports missing assets only when assets are known", () => {
  const line = 'show expression "images/missing.png"';
  const checked = renderCodeLine(line, {
    containerDir: "",
    relativeImgsInBraces: false,
    knownAssets: new Set(["images/bg.png"]),
    markers: [],
  });
  assert.deepEqual(checked, { line, problems: ['references non-existent file "images/missing.png"'] });

  const unchecked = renderCodeLine(line, { containerDir: "", relativeImgsInBraces: false, markers: [] });
  assert.deepEqual(unchecked.problems, []);
});

test("renderCodeLine keeps marker lines verbatim", () => {
  const rendered = renderCodeLine("    # TODO: fix this", {
    containerDir: "",
    relativeImgsInBraces: false,
    markers: ["# todo", "#todo"],
  });
  assert.equal(rendered.line, "    # TODO: fix this");
  assert.deepEqual(rendered.problems, ["contains the following line: # TODO: fix this"]);
});

test("renderCodeLine checks inferred image paths", () => {
  const rendered = renderCodeLine("scene {bg.png}", {
    containerDir: "chapter_1",
    relativeImgsInBraces: true,
    knownAssets: new Set(["images/chapter_1/bg.png"]),
    markers: [],
  });
  assert.deepEqual(rendered, { line: "scene 'images/chapter_1/bg.png'", problems: [] });
});

test("expressions convert to Python", () => {
  assert.equal(
    toPythonExpression("flag == true && !seen || count != 3"),
    "flag == True and not seen or count != 3"
  );
  assert.deepEqual(toPythonStatements("a = 1;\nb = false;"), ["a = 1", "b = False"]);
});
