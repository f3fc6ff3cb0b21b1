import { Err, Ok, type Result } from "@codebrief/core";

import type { BuildIssue, FileEntity } from "../model.js";
import type { SyntaxNodeOf, SyntaxProvider } from "../ports/SyntaxProvider.js";
import { DependencyResolver, type ResolutionStats } from "./DependencyResolver.js";
import { EntityBuilder } from "./EntityBuilder.js";
import { SymbolRegistry, type ReadonlyRegistry } from "./SymbolRegistry.js";

export interface SourceUnit {
  ufid: string;
  source: string;
}

export interface ProjectStats {
  files: number;
  classes: number;
  methods: number;
  issues: number;
  resolution: ResolutionStats;
}

export interface ProjectModel {
  files: FileEntity[];
  registry: ReadonlyRegistry;
  /** Files the provider could not parse at all */
  failed: BuildIssue[];
  stats: ProjectStats;
}

/**
 * Builds a whole project in two phases. Every unit is built and registered
 * first; the registry is then sealed and dependencies are resolved in one
 * pass, so forward references resolve regardless of file order.
 */
export function buildProject<N extends SyntaxNodeOf<N>>(
  provider: SyntaxProvider<N>,
  units: readonly SourceUnit[]
): Result<ProjectModel, string> {
  const registry = new SymbolRegistry();
  const builder = new EntityBuilder(provider, registry);

  const files: FileEntity[] = [];
  const failed: BuildIssue[] = [];
  for (const unit of units) {
    const built = builder.buildFile(unit.ufid, unit.source);
    if (built.ok) {
      files.push(built.value);
    } else {
      failed.push({ ufid: unit.ufid, node: "program", line: 0, message: built.error.message });
    }
  }

  registry.seal();

  const resolved = new DependencyResolver(registry).resolveAll(files);
  if (!resolved.ok) {
    return Err(resolved.error);
  }

  return Ok({
    files,
    registry,
    failed,
    stats: {
      files: files.length,
      classes: registry.classCount,
      methods: registry.methodCount,
      issues: failed.length + files.reduce((sum, file) => sum + file.issues.length, 0),
      resolution: resolved.value,
    },
  });
}
