export * from "./expressions.js";
export * from "./statements.js";
