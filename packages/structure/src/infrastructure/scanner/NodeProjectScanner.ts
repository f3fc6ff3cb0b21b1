import fs from "node:fs";
import path from "node:path";
import { type Result, Ok, Err, toError } from "@codebrief/core";

import type { ProjectScanner } from "../../core/ports/ProjectScanner.js";

// Build output, VCS and IDE directories
const ALWAYS_IGNORE = new Set([
  ".git",
  ".svn",
  ".hg",
  "node_modules",
  "target", // Maven
  "build", // Gradle
  "out",
  "bin",
  ".gradle",
  ".mvn",
  ".idea",
  ".vscode",
  ".settings",
]);

const IGNORE_PATTERNS = [/(^|\/)package-info\.java$/, /(^|\/)module-info\.java$/];

/**
 * Recursively collects source files below a root, skipping build
 * directories and whatever the root `.gitignore` lists.
 * Returned paths are relative, `/`-separated and sorted, so they can be
 * used as file ids.
 */
export class NodeProjectScanner implements ProjectScanner {
  private gitignorePatterns: RegExp[] = [];

  async scan(rootPath: string, extensions: readonly string[]): Promise<Result<string[], Error>> {
    try {
      this.loadGitignore(rootPath);

      const files: string[] = [];
      const extSet = new Set(extensions.map((e) => e.toLowerCase()));
      await this.scanDirectory(rootPath, rootPath, extSet, files);

      return Ok(files.sort());
    } catch (error) {
      return Err(toError(error));
    }
  }

  shouldIgnore(relativePath: string): boolean {
    const normalized = toPosix(relativePath);

    if (normalized.split("/").some((part) => ALWAYS_IGNORE.has(part))) {
      return true;
    }
    if (IGNORE_PATTERNS.some((pattern) => pattern.test(normalized))) {
      return true;
    }
    return this.gitignorePatterns.some((pattern) => pattern.test(normalized));
  }

  private async scanDirectory(
    rootPath: string,
    currentPath: string,
    extensions: Set<string>,
    results: string[]
  ): Promise<void> {
    const entries = await fs.promises.readdir(currentPath, { withFileTypes: true });

    for (const entry of entries) {
      const fullPath = path.join(currentPath, entry.name);
      const relativePath = toPosix(path.relative(rootPath, fullPath));

      if (this.shouldIgnore(relativePath)) {
        continue;
      }

      if (entry.isDirectory()) {
        await this.scanDirectory(rootPath, fullPath, extensions, results);
      } else if (entry.isFile() && extensions.has(path.extname(entry.name).toLowerCase())) {
        results.push(relativePath);
      }
    }
  }

  private loadGitignore(rootPath: string): void {
    this.gitignorePatterns = [];

    const gitignorePath = path.join(rootPath, ".gitignore");
    if (!fs.existsSync(gitignorePath)) {
      return;
    }

    const content = fs.readFileSync(gitignorePath, "utf-8");
    for (const line of content.split("\n")) {
      const trimmed = line.trim();
      if (!trimmed || trimmed.startsWith("#")) {
        continue;
      }
      const pattern = gitignoreToRegex(trimmed);
      if (pattern) {
        this.gitignorePatterns.push(pattern);
      }
    }
  }
}

/**
 * Simplified gitignore glob to regex. Negated patterns are not supported.
 */
export function gitignoreToRegex(pattern: string): RegExp | null {
  if (pattern.startsWith("!")) {
    return null;
  }

  let p = pattern.startsWith("/") ? pattern.slice(1) : pattern;
  p = p.replace(/[.+^${}()|[\]\\]/g, "\\$&");
  p = p.replace(/\*\*/g, "\u0000");
  p = p.replace(/\*/g, "[^/]*");
  p = p.replace(/\?/g, "[^/]");
  p = p.replace(/\u0000/g, ".*");

  if (p.endsWith("/")) {
    p = p.slice(0, -1);
  }

  return new RegExp(`(^|/)${p}($|/)`);
}

function toPosix(relativePath: string): string {
  return relativePath.split(path.sep).join("/");
}
