import { ARGUMENT_SKIP_NODES } from "./grammar.js";
import type { SyntaxNodeOf } from "./ports/SyntaxProvider.js";

/**
 * Number of argument expressions in a parsed argument list, e.g. 3 for
 * `(a, b(c, d), "x,y")`. A missing list counts as no arguments.
 */
export function callArity<N extends SyntaxNodeOf<N>>(argumentList: N | null | undefined): number {
  if (!argumentList) return 0;
  return argumentList.children.filter((child) => !ARGUMENT_SKIP_NODES.has(child.type)).length;
}
