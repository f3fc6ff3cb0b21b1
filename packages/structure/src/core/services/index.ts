export { SymbolRegistry, type ReadonlyRegistry } from "./SymbolRegistry.js";
export { EntityBuilder } from "./EntityBuilder.js";
export { DependencyResolver, narrowByArity, type Resolution, type ResolutionStats } from "./DependencyResolver.js";
export {
  CacheManager,
  CacheEntrySchema,
  CacheMapSchema,
  computeBodyHash,
  type CacheEntry,
  type CacheMap,
  type CacheLoadStats,
} from "./CacheManager.js";
export { buildProject, type ProjectModel, type ProjectStats, type SourceUnit } from "./ProjectBuilder.js";
export { classSignature, fieldSignature, methodSignature, parseModifiers } from "./signatures.js";
