export * from "./config.js";
export * from "./report.js";
export * from "./test.js";
export * from "./value.js";
