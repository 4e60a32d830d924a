export * from "./assertions/index.js";
export * from "./config/index.js";
export * from "./hooks/index.js";
export * from "./report/index.js";
export * from "./runner/index.js";
export * from "./types/index.js";
