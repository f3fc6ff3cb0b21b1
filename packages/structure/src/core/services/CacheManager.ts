import { createHash } from "node:crypto";
import * as z from "zod/v4";

import type { MethodEntity } from "../model.js";
import type { ReadonlyRegistry } from "./SymbolRegistry.js";

export const CacheEntrySchema = z.object({
  hash: z.string(),
  description: z.string(),
  confidence: z.number().optional(),
});

/**
 * Persisted map: method umid (or class ucid) to the body hash the
 * description was generated from.
 */
export const CacheMapSchema = z.record(z.string(), CacheEntrySchema);

export type CacheEntry = z.infer<typeof CacheEntrySchema>;
export type CacheMap = z.infer<typeof CacheMapSchema>;

export interface CacheLoadStats {
  cleanMethods: number;
  dirtyMethods: number;
  cleanClasses: number;
  dirtyClasses: number;
}

/**
 * SHA-256 of the body with all whitespace removed, so reformatting does not
 * invalidate a description.
 */
export function computeBodyHash(body: string): string {
  return createHash("sha256").update(body.replace(/\s+/g, "")).digest("hex");
}

type Describable = Pick<MethodEntity, "bodyHash" | "description" | "confidence">;

/**
 * Matches cached descriptions against freshly computed body hashes.
 *
 * A method is dirty when its description is empty after `load`: either the
 * cache had no entry or the entry's hash no longer matches. Dirtiness does
 * not propagate through dependencies.
 */
export class CacheManager {
  constructor(private readonly registry: ReadonlyRegistry) {}

  load(cache: CacheMap): CacheLoadStats {
    const stats: CacheLoadStats = { cleanMethods: 0, dirtyMethods: 0, cleanClasses: 0, dirtyClasses: 0 };

    for (const method of this.registry.methods()) {
      if (seed(method, cache[method.umid])) {
        stats.cleanMethods++;
      } else {
        stats.dirtyMethods++;
      }
    }

    for (const cls of this.registry.classes()) {
      if (seed(cls, cache[cls.ucid])) {
        cls.annotationStatus = "cached";
        stats.cleanClasses++;
      } else {
        cls.annotationStatus = "pending";
        stats.dirtyClasses++;
      }
    }

    return stats;
  }

  /**
   * Snapshot of the current state for persistence.
   * Entities without a description are left out, so they stay dirty next run.
   */
  export(): CacheMap {
    const cache: CacheMap = {};

    for (const cls of this.registry.classes()) {
      if (cls.description) {
        cache[cls.ucid] = entry(cls);
      }
    }
    for (const method of this.registry.methods()) {
      if (method.description) {
        cache[method.umid] = entry(method);
      }
    }

    return cache;
  }

  isDirty(method: MethodEntity): boolean {
    return method.description === "";
  }

  partition(): { dirty: MethodEntity[]; clean: MethodEntity[] } {
    const dirty: MethodEntity[] = [];
    const clean: MethodEntity[] = [];
    for (const method of this.registry.methods()) {
      (this.isDirty(method) ? dirty : clean).push(method);
    }
    return { dirty, clean };
  }
}

function seed(target: Describable, cached: CacheEntry | undefined): boolean {
  if (cached && cached.hash === target.bodyHash) {
    target.description = cached.description;
    target.confidence = cached.confidence ?? 0;
    return target.description !== "";
  }
  target.description = "";
  target.confidence = 0;
  return false;
}

function entry(target: Describable): CacheEntry {
  return { hash: target.bodyHash, description: target.description, confidence: target.confidence };
}
