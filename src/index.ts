export const CSL_STYLE_COMPILER_VERSION = "0.1.0";

export * from "./core/errors.js";
export * from "./core/option-map.js";
export type * from "./core/types.js";
export * from "./compiler/index.js";
export * from "./locale/index.js";
