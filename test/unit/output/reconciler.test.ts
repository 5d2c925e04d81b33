import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { test } from "vitest";

import { FlowCompilerError } from "../../../src/core/errors.js";
import { planReconcile, reconcileOutput } from "../../../src/output/reconciler.js";

const footprint = { filePrefix: "articy_", expectedDirs: new Set(["chapter_1"]) };

const isCode = (code: string) => (error: unknown) => error instanceof FlowCompilerError && error.code === code;

const listTree = (dir: string): string[] =>
  fs
    .readdirSync(dir, { recursive: true, encoding: "utf8" })
    .map((entry) => entry.split(path.sep).join("/"))
    .sort();

test("planReconcile decides before touching anything", () => {
  assert.deepEqual(planReconcile(null, footprint), { action: "create" });

  const generated = [
    { name: "articy_start.rpy", isDirectory: false },
    { name: "chapter_1", isDirectory: true },
  ];
  assert.deepEqual(planReconcile(generated, footprint), { action: "replace", entries: generated });
  assert.deepEqual(planReconcile([], footprint), { action: "replace", entries: [] });

  assert.deepEqual(planReconcile([{ name: "notes.txt", isDirectory: false }], footprint), {
    action: "abort",
    entry: { name: "notes.txt", isDirectory: false },
    reason: 'Did not expect file "notes.txt"',
  });
  assert.deepEqual(planReconcile([{ name: "old", isDirectory: true }], footprint), {
    action: "abort",
    entry: { name: "old", isDirectory: true },
    reason: 'Did not expect directory "old"',
  });
});

test("reconcileOutput creates a missing directory", () => {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "flow-reconcile-create-"));
  const target = path.join(root, "game", "articy");

  const decision = reconcileOutput(target, { "articy_start.rpy": "a\n", "chapter_1/articy_chapter_1.rpy": "b\n" }, footprint);
  assert.deepEqual(decision, { action: "create" });
  assert.deepEqual(listTree(target), ["articy_start.rpy", "chapter_1", "chapter_1/articy_chapter_1.rpy"]);
  assert.equal(fs.readFileSync(path.join(target, "chapter_1", "articy_chapter_1.rpy"), "utf8"), "b\n");
});

test("reconcileOutput replaces previously generated output", () => {
  const target = fs.mkdtempSync(path.join(os.tmpdir(), "flow-reconcile-replace-"));
  fs.writeFileSync(path.join(target, "articy_old.rpy"), "old");
  fs.mkdirSync(path.join(target, "chapter_1"));
  fs.writeFileSync(path.join(target, "chapter_1", "stale.rpy"), "stale");

  const decision = reconcileOutput(target, { "articy_start.rpy": "new\n" }, footprint);
  assert.equal(decision.action, "replace");
  assert.deepEqual(listTree(target), ["articy_start.rpy"]);
});

test("reconcileOutput leaves unexpected content untouched", () => {
  const target = fs.mkdtempSync(path.join(os.tmpdir(), "flow-reconcile-abort-"));
  fs.writeFileSync(path.join(target, "articy_start.rpy"), "keep");
  fs.writeFileSync(path.join(target, "readme.txt"), "mine");
  const before = listTree(target);

  assert.throws(() => reconcileOutput(target, { "articy_start.rpy": "new\n" }, footprint), isCode("OUTPUT_UNEXPECTED_CONTENT"));
  assert.deepEqual(listTree(target), before);
  assert.equal(fs.readFileSync(path.join(target, "articy_start.rpy"), "utf8"), "keep");
});

test("reconcileOutput rejects a file as target", () => {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "flow-reconcile-file-"));
  const target = path.join(root, "articy");
  fs.writeFileSync(target, "not a directory");
  assert.throws(() => reconcileOutput(target, {}, footprint), isCode("OUTPUT_NOT_DIRECTORY"));
});
