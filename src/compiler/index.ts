export * from "./fragment.js";
export * from "./locale-merge.js";
export * from "./names.js";
export * from "./options.js";
export * from "./render-compiler.js";
export * from "./source.js";
export * from "./style.js";
export * from "./xml.js";
export type * from "./xml-types.js";
