import type { Result } from "@codebrief/core";

/**
 * Port for the file operations the pipeline needs.
 */
export interface FileSystem {
  read(filePath: string): Result<string, Error>;

  write(filePath: string, content: string): Result<void, Error>;

  exists(filePath: string): boolean;
}
