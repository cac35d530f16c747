export * from "./spec-version";
export * from "./encoding";
export * from "./extension-value";
export * from "./event";
