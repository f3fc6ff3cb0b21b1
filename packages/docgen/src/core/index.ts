export * from "./model.js";
export * from "./schemas.js";
export * from "./config.js";
export type * from "./ports/index.js";
