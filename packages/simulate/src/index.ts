export * from "./aggregate.js";
export * from "./scenarios.js";
export * from "./custom.js";
export * from "./errors.js";

export type * from "./types.js";
