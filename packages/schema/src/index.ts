export * from "./board.js";
export * from "./entry.js";
export * from "./enums.js";
export * from "./query.js";
