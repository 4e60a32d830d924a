export * from "./details.js";
export * from "./errors.js";
export * from "./session.js";
export * from "./summary.js";
