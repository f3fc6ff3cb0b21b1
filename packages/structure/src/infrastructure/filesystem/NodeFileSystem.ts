import fs from "node:fs";
import path from "node:path";
import { type Result, Ok, Err, toError } from "@codebrief/core";

import type { FileSystem } from "../../core/ports/FileSystem.js";

/**
 * FileSystem port over node:fs. Relative paths resolve against `basePath`.
 */
export class NodeFileSystem implements FileSystem {
  private readonly basePath: string;

  constructor(basePath?: string) {
    this.basePath = basePath ?? process.cwd();
  }

  private resolvePath(filePath: string): string {
    return path.isAbsolute(filePath) ? filePath : path.resolve(this.basePath, filePath);
  }

  read(filePath: string): Result<string, Error> {
    try {
      return Ok(fs.readFileSync(this.resolvePath(filePath), "utf-8"));
    } catch (error) {
      return Err(toError(error));
    }
  }

  write(filePath: string, content: string): Result<void, Error> {
    try {
      const resolved = this.resolvePath(filePath);
      fs.mkdirSync(path.dirname(resolved), { recursive: true });
      fs.writeFileSync(resolved, content, "utf-8");
      return Ok(undefined);
    } catch (error) {
      return Err(toError(error));
    }
  }

  exists(filePath: string): boolean {
    return fs.existsSync(this.resolvePath(filePath));
  }
}
