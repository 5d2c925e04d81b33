export const RENPY_FLOW_COMPILER_VERSION = "0.1.0";

export * from "./core/errors.js";
export type * from "./core/types.js";
export * from "./core/settings.js";
export * from "./compiler/index.js";
export * from "./output/log-report.js";
export * from "./output/reconciler.js";
export * from "./api.js";
