export * from "./formatters/index.js";
export * from "./http-executor.js";
export * from "./types.js";
