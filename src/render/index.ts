export * from "./compact.js";
export * from "./call-index.js";
export * from "./wrap.js";
export * from "./palette.js";
export * from "./turn.js";
export * from "./conversation.js";
