// Annotation model, schemas and configuration
export * from "./core/index.js";
export * from "./core/services/index.js";

// Infrastructure implementations
export * from "./infrastructure/index.js";

// Tool exports
export { registerAllTools, type Services, type JavaService } from "./tools/index.js";
