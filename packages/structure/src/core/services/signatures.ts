/**
 * Modifier parsing and signature text assembly.
 */

import type { ClassKind, Modifiers, Visibility } from "../model.js";
import type { SyntaxNodeOf } from "../ports/SyntaxProvider.js";

const VISIBILITIES = new Set<string>(["public", "protected", "private"]);
const ANNOTATION_NODES = new Set(["marker_annotation", "annotation"]);

function isVisibility(token: string): token is Exclude<Visibility, "package-private"> {
  return VISIBILITIES.has(token);
}

/**
 * Read a `modifiers` node. A missing node means no modifiers.
 */
export function parseModifiers<N extends SyntaxNodeOf<N>>(node: N | undefined): Modifiers {
  const modifiers: Modifiers = {
    visibility: "package-private",
    isAbstract: false,
    isStatic: false,
    isFinal: false,
    isSynchronized: false,
    isVolatile: false,
  };
  if (!node) return modifiers;

  for (const child of node.children) {
    const token = child.text;

    if (ANNOTATION_NODES.has(child.type) || token.startsWith("@")) {
      modifiers.annotation ??= token;
      continue;
    }

    if (isVisibility(token)) {
      modifiers.visibility = token;
      continue;
    }

    switch (token) {
      case "abstract":
        modifiers.isAbstract = true;
        break;
      case "static":
        modifiers.isStatic = true;
        break;
      case "final":
        modifiers.isFinal = true;
        break;
      case "synchronized":
        modifiers.isSynchronized = true;
        break;
      case "volatile":
        modifiers.isVolatile = true;
        break;
    }
  }

  return modifiers;
}

/**
 * Modifier prefix in canonical order:
 * annotation, visibility, abstract, static, final, synchronized, volatile.
 * The package-private sentinel is not written out.
 */
function modifierPrefix(modifiers: Modifiers): string[] {
  return [
    modifiers.annotation,
    modifiers.visibility === "package-private" ? undefined : modifiers.visibility,
    modifiers.isAbstract ? "abstract" : undefined,
    modifiers.isStatic ? "static" : undefined,
    modifiers.isFinal ? "final" : undefined,
    modifiers.isSynchronized ? "synchronized" : undefined,
    modifiers.isVolatile ? "volatile" : undefined,
  ].filter((part): part is string => Boolean(part));
}

function genericList(typeParameters: readonly string[]): string {
  return typeParameters.length > 0 ? `<${typeParameters.join(", ")}>` : "";
}

export interface MethodSignatureParts {
  modifiers: Modifiers;
  returnType: string;
  identifier: string;
  typeParameters: readonly string[];
  parameters: readonly string[];
  throws?: string;
}

/** e.g. `@Override public static <T> List<T> wrap(T item) throws IOException` */
export function methodSignature(parts: MethodSignatureParts): string {
  const declarator =
    `${parts.returnType} ${parts.identifier}` +
    `${genericList(parts.typeParameters)}(${parts.parameters.join(", ")})`;

  return [...modifierPrefix(parts.modifiers), declarator, parts.throws]
    .filter((part): part is string => Boolean(part))
    .join(" ");
}

export interface FieldSignatureParts {
  modifiers: Modifiers;
  type: string;
  identifier: string;
  value?: string;
}

/** e.g. `private static final int LIMIT = 10` */
export function fieldSignature(parts: FieldSignatureParts): string {
  const signature = [...modifierPrefix(parts.modifiers), `${parts.type} ${parts.identifier}`].join(" ");
  return parts.value ? `${signature} = ${parts.value}` : signature;
}

export interface ClassSignatureParts {
  kind: ClassKind;
  modifiers: Modifiers;
  identifier: string;
  typeParameters: readonly string[];
  /** Record components, written after the name */
  components?: readonly string[];
  extendsTypes: readonly string[];
  implementsTypes: readonly string[];
}

/** e.g. `public abstract class Repo<T> extends Base implements Closeable` */
export function classSignature(parts: ClassSignatureParts): string {
  let declarator = `${parts.kind} ${parts.identifier}${genericList(parts.typeParameters)}`;
  if (parts.components) {
    declarator += `(${parts.components.join(", ")})`;
  }

  const clauses: string[] = [];
  if (parts.extendsTypes.length > 0) {
    clauses.push(`extends ${parts.extendsTypes.join(", ")}`);
  }
  if (parts.implementsTypes.length > 0) {
    clauses.push(`implements ${parts.implementsTypes.join(", ")}`);
  }

  return [...modifierPrefix(parts.modifiers), declarator, ...clauses].join(" ");
}
