/**
 * Core type exports
 */

export * from "./message.js";
export * from "./tool.js";
export * from "./provider.js";
export * from "./agent.js";
