export * from "./config.js";
export * from "./record.js";
