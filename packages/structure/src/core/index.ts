export * from "./model.js";
export * from "./ids.js";
export * from "./arity.js";
export * from "./views.js";
export type * from "./ports/index.js";
