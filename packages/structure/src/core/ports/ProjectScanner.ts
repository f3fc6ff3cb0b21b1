import type { Result } from "@codebrief/core";

/**
 * Port for discovering source files in a project.
 */
export interface ProjectScanner {
  /**
   * Scan a directory for source files.
   *
   * @param rootPath - Project root directory
   * @param extensions - File extensions to include (e.g., [".java"])
   * @returns Paths relative to rootPath, sorted
   */
  scan(rootPath: string, extensions: readonly string[]): Promise<Result<string[], Error>>;

  shouldIgnore(relativePath: string): boolean;
}
