// Entity model, identifiers and views
export * from "./core/index.js";
export * from "./core/services/index.js";

// Infrastructure implementations
export * from "./infrastructure/index.js";
