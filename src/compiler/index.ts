export * from "./branches.js";
export * from "./compiler.js";
export * from "./definitions.js";
export * from "./directives.js";
export * from "./export.js";
export * from "./nodes.js";
export * from "./text.js";
