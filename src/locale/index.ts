export * from "./compat.js";
export * from "./getter.js";
export * from "./terms.js";
