export * from "./api.js";
export * from "./equality.js";
export * from "./evaluate.js";
export * from "./format.js";
export * from "./lifecycle.js";
export * from "./truthy.js";
