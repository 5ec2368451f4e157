// pattern: Functional Core
export * from "./settings.js";
export * from "./utils.js";
