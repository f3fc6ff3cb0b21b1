import { Err, Ok, type Result } from "@codebrief/core";

import type { FileEntity, MethodEntity, RawDependency, ResolutionTier, ResolvedDependency } from "../model.js";
import { fileMethods } from "../model.js";
import { makeScopedIdentifier } from "../ids.js";
import type { ReadonlyRegistry } from "./SymbolRegistry.js";

export type Resolution =
  | { tier: ResolutionTier; candidates: readonly MethodEntity[]; ambiguous: boolean }
  | { tier: "unresolved" };

export interface ResolutionStats {
  methods: number;
  resolved: number;
  ambiguous: number;
  unresolved: number;
}

/**
 * Turns each method's call sites into references to registered methods.
 *
 * Tiers, first hit wins: the caller's own class, then each import in file
 * order, then any method with that bare name. Within a tier a single
 * candidate is taken as is; several candidates are narrowed by argument
 * count only, never by argument type.
 */
export class DependencyResolver {
  constructor(private readonly registry: ReadonlyRegistry) {}

  /**
   * Resolve every method in the project. Requires a sealed registry, so
   * calls into files built later still resolve.
   */
  resolveAll(files: readonly FileEntity[]): Result<ResolutionStats, string> {
    if (!this.registry.sealed) {
      return Err("Dependency resolution needs a sealed registry; build every file first");
    }

    const stats: ResolutionStats = { methods: 0, resolved: 0, ambiguous: 0, unresolved: 0 };
    for (const file of files) {
      for (const method of fileMethods(file)) {
        this.resolveMethod(method, file.imports);
        stats.methods++;
        stats.resolved += method.dependencies.length;
        stats.ambiguous += method.dependencies.filter((d) => d.ambiguous).length;
        stats.unresolved += method.unresolvedDependencies.length;
      }
    }
    return Ok(stats);
  }

  /**
   * Replace a method's dependency lists from its raw call sites.
   */
  resolveMethod(method: MethodEntity, imports: readonly string[]): void {
    const resolved = new Map<string, ResolvedDependency>();
    const unresolved = new Set<string>();

    for (const call of method.rawDependencies) {
      const resolution = this.resolveCall(method, call, imports);
      if (resolution.tier === "unresolved") {
        unresolved.add(call.name);
        continue;
      }
      for (const candidate of resolution.candidates) {
        if (candidate.umid === method.umid || resolved.has(candidate.umid)) continue;
        resolved.set(candidate.umid, {
          umid: candidate.umid,
          tier: resolution.tier,
          ambiguous: resolution.ambiguous,
        });
      }
    }

    method.dependencies = [...resolved.values()];
    method.unresolvedDependencies = [...unresolved];
  }

  /**
   * Resolve a single call site from `caller`. Pure with respect to the registry.
   */
  resolveCall(caller: MethodEntity, call: RawDependency, imports: readonly string[]): Resolution {
    const local = this.registry.lookupByScoped(makeScopedIdentifier(caller.ucid, call.name));
    if (local.length > 0) {
      return { tier: "local", ...narrowByArity(local, call.arity) };
    }

    const imported = this.importCandidates(call.name, imports);
    if (imported.length > 0) {
      return { tier: "import", ...narrowByArity(imported, call.arity) };
    }

    const global = this.registry.lookupByShortName(call.name);
    if (global.length > 0) {
      return { tier: "global", ...narrowByArity(global, call.arity) };
    }

    return { tier: "unresolved" };
  }

  /**
   * Methods reachable as `<import>.<name>`, across all imports in order.
   * A static import naming the method itself (`a.B.name`) is looked up directly.
   */
  private importCandidates(name: string, imports: readonly string[]): MethodEntity[] {
    const seen = new Set<string>();
    const candidates: MethodEntity[] = [];

    for (const imported of imports) {
      const keys = [makeScopedIdentifier(imported, name)];
      if (imported.endsWith(`.${name}`)) {
        keys.push(imported);
      }
      for (const key of keys) {
        for (const method of this.registry.lookupByScoped(key)) {
          if (!seen.has(method.umid)) {
            seen.add(method.umid);
            candidates.push(method);
          }
        }
      }
    }

    return candidates;
  }
}

/**
 * One candidate is a confident match. Several are filtered by arity: one
 * survivor is confident, more are ambiguous. If none survive the tier
 * still ends the search and contributes nothing.
 */
export function narrowByArity(
  candidates: readonly MethodEntity[],
  arity: number
): { candidates: readonly MethodEntity[]; ambiguous: boolean } {
  if (candidates.length === 1) {
    return { candidates, ambiguous: false };
  }

  const matching = candidates.filter((candidate) => candidate.arity === arity);
  if (matching.length === 1) {
    return { candidates: matching, ambiguous: false };
  }
  return { candidates: matching, ambiguous: matching.length > 1 };
}
