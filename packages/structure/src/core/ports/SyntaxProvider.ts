import type { Result } from "@codebrief/core";

export interface Point {
  /** 0-indexed */
  row: number;
  column: number;
}

/**
 * The parts of a syntax tree node the builder reads, parameterized by the
 * provider's own node type so children and captures keep that type.
 */
export interface SyntaxNodeOf<N> {
  readonly type: string;
  /** Source text covered by the node's byte range */
  readonly text: string;
  readonly startPosition: Point;
  readonly children: readonly N[];
  childForFieldName(fieldName: string): N | null;
}

export interface SyntaxNode extends SyntaxNodeOf<SyntaxNode> {}

/**
 * Port for the parser that turns source text into a queryable tree.
 */
export interface SyntaxProvider<N extends SyntaxNodeOf<N> = SyntaxNode> {
  /** Language id, e.g. "java" */
  readonly language: string;
  /** File extensions the provider parses, e.g. [".java"] */
  readonly extensions: readonly string[];

  parse(source: string): Result<N, Error>;

  /**
   * Run a query pattern below `node` and group the matches by capture label.
   * Labels without matches are absent from the map.
   */
  capture(node: N, pattern: string): Result<Map<string, N[]>, Error>;
}
