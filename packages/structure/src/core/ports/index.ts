export type { Point, SyntaxNode, SyntaxNodeOf, SyntaxProvider } from "./SyntaxProvider.js";
export type { FileSystem } from "./FileSystem.js";
export type { ProjectScanner } from "./ProjectScanner.js";
export type { CacheStore } from "./CacheStore.js";
