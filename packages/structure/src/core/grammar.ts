/**
 * Node types and query patterns of the Java grammar the builder walks.
 */

import type { ClassKind } from "./model.js";

export const CLASS_NODE_KINDS: Record<string, ClassKind> = {
  class_declaration: "class",
  interface_declaration: "interface",
  enum_declaration: "enum",
  record_declaration: "record",
};

export const METHOD_NODES = new Set(["method_declaration", "constructor_declaration"]);
export const FIELD_NODES = new Set(["field_declaration", "constant_declaration"]);
export const PARAMETER_NODES = new Set(["formal_parameter", "spread_parameter"]);
export const NAME_NODES = new Set(["scoped_identifier", "identifier"]);

/** Members of an enum that follow its constant list */
export const ENUM_MEMBERS_NODE = "enum_body_declarations";

/** Every method invocation, captured whole so name and arguments stay paired */
export const CALL_QUERY = "(method_invocation name: (identifier)) @call";

/** Children of an `argument_list` that are not arguments */
export const ARGUMENT_SKIP_NODES = new Set(["(", ",", ")", "line_comment", "block_comment"]);
