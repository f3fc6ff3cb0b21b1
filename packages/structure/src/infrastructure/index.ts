export { NodeFileSystem } from "./filesystem/NodeFileSystem.js";
export { NodeProjectScanner, gitignoreToRegex } from "./scanner/NodeProjectScanner.js";
export { TreeSitterJavaProvider, type JavaNode } from "./parsers/TreeSitterJavaProvider.js";
export { JsonCacheStore } from "./cache/JsonCacheStore.js";
