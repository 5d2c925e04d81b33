import fs from "node:fs";
import path from "node:path";

import { FlowCompilerError } from "../core/errors.js";

export interface DirectoryEntry {
  name: string;
  isDirectory: boolean;
}

export interface OutputFootprint {
  filePrefix: string;
  expectedDirs: ReadonlySet<string>;
}

export type ReconcileDecision =
  | { action: "create" }
  | { action: "replace"; entries: DirectoryEntry[] }
  | { action: "abort"; entry: DirectoryEntry; reason: string };

/**
 * Decides whether an existing target directory looks machine-generated.
 * `existing` is null when the directory does not exist yet.
 */
export const planReconcile = (
  existing: DirectoryEntry[] | null,
  footprint: OutputFootprint
): ReconcileDecision => {
  if (existing === null) {
    return { action: "create" };
  }
  for (const entry of existing) {
    if (entry.isDirectory && !footprint.expectedDirs.has(entry.name)) {
      return { action: "abort", entry, reason: `Did not expect directory "${entry.name}"` };
    }
    if (!entry.isDirectory && !entry.name.startsWith(footprint.filePrefix)) {
      return { action: "abort", entry, reason: `Did not expect file "${entry.name}"` };
    }
  }
  return { action: "replace", entries: existing };
};

export const readDirectoryEntries = (targetDir: string): DirectoryEntry[] | null => {
  if (!fs.existsSync(targetDir)) {
    return null;
  }
  if (!fs.statSync(targetDir).isDirectory()) {
    throw new FlowCompilerError("OUTPUT_NOT_DIRECTORY", `Target path is not a directory: ${targetDir}`);
  }
  return fs
    .readdirSync(targetDir, { withFileTypes: true })
    .map((entry) => ({ name: entry.name, isDirectory: entry.isDirectory() }))
    .sort((a, b) => a.name.localeCompare(b.name));
};

/**
 * Replaces the contents of `targetDir` with `files` (relative posix path →
 * content). Nothing is deleted unless every existing entry passes the
 * fingerprint check.
 */
export const reconcileOutput = (
  targetDir: string,
  files: Record<string, string>,
  footprint: OutputFootprint
): ReconcileDecision => {
  const decision = planReconcile(readDirectoryEntries(targetDir), footprint);
  if (decision.action === "abort") {
    throw new FlowCompilerError(
      "OUTPUT_UNEXPECTED_CONTENT",
      `${decision.reason} in directory ${targetDir}. Refusing to delete it.`
    );
  }
  if (decision.action === "replace") {
    for (const entry of decision.entries) {
      fs.rmSync(path.join(targetDir, entry.name), { recursive: true, force: true });
    }
  }
  fs.mkdirSync(targetDir, { recursive: true });
  for (const [relativePath, content] of Object.entries(files)) {
    const fullPath = path.join(targetDir, ...relativePath.split("/"));
    fs.mkdirSync(path.dirname(fullPath), { recursive: true });
    fs.writeFileSync(fullPath, content, "utf8");
  }
  return decision;
};
