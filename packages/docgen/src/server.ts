#!/usr/bin/env node
/**
 * MCP server that indexes a Java project and describes its classes and methods.
 */

import { runServer } from "@codebrief/core";
import { JsonCacheStore, NodeFileSystem, NodeProjectScanner, TreeSitterJavaProvider } from "@codebrief/structure";

import { loadConfig } from "./core/config.js";
import { DocgenService } from "./core/services/DocgenService.js";
import { GeminiAnnotationGenerator } from "./infrastructure/gemini/GeminiAnnotationGenerator.js";
import { type Services, registerAllTools } from "./tools/index.js";

runServer<Services>({
  config: {
    name: "codebrief:docgen",
    version: "0.1.0",
  },
  createServices: () => {
    const loaded = loadConfig(process.env);
    if (!loaded.ok) {
      throw new Error(loaded.error);
    }
    const config = loaded.value;
    if (!config.apiKey) {
      console.error("[docgen] GEMINI_API_KEY is not set; annotate_project is unavailable");
    }

    const fs = new NodeFileSystem();
    return {
      docgen: new DocgenService({
        provider: new TreeSitterJavaProvider(),
        fs,
        scanner: new NodeProjectScanner(),
        generator: config.apiKey
          ? new GeminiAnnotationGenerator({ apiKey: config.apiKey, model: config.model, temperature: config.temperature })
          : undefined,
        createCacheStore: (cachePath) => new JsonCacheStore(fs, cachePath),
        config,
      }),
    };
  },
  registerTools: registerAllTools,
  onStartup: async (services) => {
    const result = await services.docgen.index(process.cwd());
    if (!result.ok) {
      console.error(`[docgen] Startup indexing failed: ${result.error}`);
    }
  },
});
