import type { Result } from "@codebrief/core";
import type { CacheMap } from "../services/CacheManager.js";

/**
 * Port for persisting the description cache between runs.
 */
export interface CacheStore {
  /** A missing cache is an empty map, not an error */
  load(): Result<CacheMap, Error>;

  save(cache: CacheMap): Result<void, Error>;
}
