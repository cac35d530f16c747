export * from "./attributes";
export * from "./bus";
export * from "./event-format";
export * from "./extension";
export * from "./io-options";
export * from "./message";
export * from "./visitors";
