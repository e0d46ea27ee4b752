export * from "./config.js";
export * from "./suite.js";
export * from "./result.js";
