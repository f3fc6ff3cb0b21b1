import { type Result, Ok, Err } from "@codebrief/core";

import type { CacheStore } from "../../core/ports/CacheStore.js";
import type { FileSystem } from "../../core/ports/FileSystem.js";
import { type CacheMap, CacheMapSchema } from "../../core/services/CacheManager.js";

/**
 * Description cache persisted as one JSON object: id to `{hash, description}`.
 */
export class JsonCacheStore implements CacheStore {
  constructor(
    private readonly fs: FileSystem,
    private readonly cachePath: string
  ) {}

  load(): Result<CacheMap, Error> {
    if (!this.fs.exists(this.cachePath)) {
      return Ok({});
    }

    const content = this.fs.read(this.cachePath);
    if (!content.ok) {
      return content;
    }

    let json: unknown;
    try {
      json = JSON.parse(content.value);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return Err(new Error(`Cache file ${this.cachePath} is not valid JSON: ${reason}`));
    }

    const parsed = CacheMapSchema.safeParse(json);
    if (!parsed.success) {
      return Err(new Error(`Cache file ${this.cachePath} has an unexpected shape: ${parsed.error.message}`));
    }
    return Ok(parsed.data);
  }

  save(cache: CacheMap): Result<void, Error> {
    return this.fs.write(this.cachePath, JSON.stringify(cache, null, 2) + "\n");
  }
}
