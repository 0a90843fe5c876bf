export * from "./scope.js";
export * from "./decision.js";
