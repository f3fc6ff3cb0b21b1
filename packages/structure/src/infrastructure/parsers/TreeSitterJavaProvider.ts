import { Err, Ok, type Result, toError } from "@codebrief/core";
import Parser from "tree-sitter";
import Java from "tree-sitter-java";

import type { SyntaxProvider } from "../../core/ports/SyntaxProvider.js";

export type JavaNode = Parser.SyntaxNode;

// node-tree-sitter rejects string inputs above its default buffer size
const CHUNK_SIZE = 16 * 1024;

/**
 * Java syntax provider over tree-sitter.
 * Query patterns are compiled once and reused.
 */
export class TreeSitterJavaProvider implements SyntaxProvider<JavaNode> {
  readonly language = "java";
  readonly extensions = [".java"] as const;

  private readonly parser: Parser;
  private readonly queries = new Map<string, Parser.Query>();

  constructor() {
    this.parser = new Parser();
    this.parser.setLanguage(Java);
  }

  parse(source: string): Result<JavaNode, Error> {
    try {
      const tree = this.parser.parse((index: number) => source.slice(index, index + CHUNK_SIZE));
      return Ok(tree.rootNode);
    } catch (error) {
      return Err(toError(error));
    }
  }

  capture(node: JavaNode, pattern: string): Result<Map<string, JavaNode[]>, Error> {
    const query = this.query(pattern);
    if (!query.ok) {
      return query;
    }

    try {
      const groups = new Map<string, JavaNode[]>();
      for (const { name, node: captured } of query.value.captures(node)) {
        const group = groups.get(name);
        if (group) {
          group.push(captured);
        } else {
          groups.set(name, [captured]);
        }
      }
      return Ok(groups);
    } catch (error) {
      return Err(toError(error));
    }
  }

  private query(pattern: string): Result<Parser.Query, Error> {
    const cached = this.queries.get(pattern);
    if (cached) {
      return Ok(cached);
    }

    try {
      const query = new Parser.Query(Java, pattern);
      this.queries.set(pattern, query);
      return Ok(query);
    } catch (error) {
      return Err(new Error(`Invalid query pattern: ${toError(error).message}`));
    }
  }
}
