import assert from "node:assert/strict";
import { test } from "vitest";

import { FlowCompilerError } from "../../../src/core/errors.js";

test("FlowCompilerError carries code and node id", () => {
  const error = new FlowCompilerError("X_CODE", "boom", "0x01");
  assert.equal(error.name, "FlowCompilerError");
  assert.equal(error.code, "X_CODE");
  assert.equal(error.message, "boom");
  assert.equal(error.nodeId, "0x01");
  assert.ok(error instanceof Error);
});

test("node id is optional", () => {
  assert.equal(new FlowCompilerError("X_CODE", "boom").nodeId, undefined);
});
