import { Ok, type Result, tryCatch } from "@codebrief/core";

import {
  CALL_QUERY,
  CLASS_NODE_KINDS,
  ENUM_MEMBERS_NODE,
  FIELD_NODES,
  METHOD_NODES,
  NAME_NODES,
  PARAMETER_NODES,
} from "../grammar.js";
import { callArity } from "../arity.js";
import {
  CONSTRUCTOR_IDENTIFIER,
  UNKNOWN_IDENTIFIER,
  makeFieldId,
  makeScopedIdentifier,
  makeUcid,
  makeUmid,
} from "../ids.js";
import type { ClassEntity, FieldEntity, FileEntity, MethodEntity, RawDependency } from "../model.js";
import type { SyntaxNodeOf, SyntaxProvider } from "../ports/SyntaxProvider.js";
import { computeBodyHash } from "./CacheManager.js";
import { classSignature, fieldSignature, methodSignature, parseModifiers } from "./signatures.js";
import type { SymbolRegistry } from "./SymbolRegistry.js";

/**
 * Builds File/Class/Method/Field entities from syntax trees and registers
 * every class and method as it is created.
 *
 * A malformed member yields placeholders or a BuildIssue; it never fails
 * the file.
 */
export class EntityBuilder<N extends SyntaxNodeOf<N>> {
  constructor(
    private readonly provider: SyntaxProvider<N>,
    private readonly registry: SymbolRegistry
  ) {}

  buildFile(ufid: string, source: string): Result<FileEntity, Error> {
    const parsed = this.provider.parse(source);
    if (!parsed.ok) {
      return parsed;
    }
    return Ok(this.buildFromTree(ufid, parsed.value));
  }

  buildFromTree(ufid: string, root: N): FileEntity {
    const file: FileEntity = { ufid, package: "", imports: [], classes: [], issues: [] };

    for (const child of root.children) {
      if (child.type === "package_declaration") {
        file.package = findChild(child, NAME_NODES)?.text ?? "";
      } else if (child.type === "import_declaration") {
        const imported = importText(child);
        if (imported) file.imports.push(imported);
      } else if (child.type in CLASS_NODE_KINDS) {
        this.guard(file, child, () => {
          const cls = this.buildClass(file, child, file.package);
          if (cls) file.classes.push(cls);
        });
      }
    }

    return file;
  }

  private buildClass(file: FileEntity, node: N, scope: string): ClassEntity | null {
    const kind = CLASS_NODE_KINDS[node.type];
    const identifier = node.childForFieldName("name")?.text ?? UNKNOWN_IDENTIFIER;
    const ucid = makeUcid(scope, identifier);
    const modifiers = parseModifiers(findChild(node, "modifiers"));
    const typeParameters = typeParameterList(findChild(node, "type_parameters"));

    const superclass = findChild(node, "superclass");
    const extendsTypes =
      kind === "interface"
        ? typeList(findChild(node, "extends_interfaces"))
        : superclass
          ? [stripKeyword(superclass.text, "extends")]
          : [];
    const implementsTypes = typeList(findChild(node, "super_interfaces"));

    const components =
      kind === "record" ? parameterList(node.childForFieldName("parameters")).map((p) => p.text) : undefined;

    const bodyNode = node.childForFieldName("body");
    const body = bodyNode?.text ?? "";

    const base = {
      ucid,
      identifier,
      signature: classSignature({ kind, modifiers, identifier, typeParameters, components, extendsTypes, implementsTypes }),
      body,
      bodyHash: computeBodyHash(body),
      line: node.startPosition.row + 1,
      modifiers,
      typeParameters,
      supertypes: [...extendsTypes, ...implementsTypes],
      methods: new Map<string, MethodEntity>(),
      fields: new Map<string, FieldEntity>(),
      classes: new Map<string, ClassEntity>(),
      description: "",
      confidence: 0,
      annotationStatus: "pending" as const,
    };
    const cls: ClassEntity = kind === "enum" ? { ...base, kind, constants: [] } : { ...base, kind };

    const registered = this.registry.registerClass(cls);
    if (!registered.ok) {
      this.issue(file, node, registered.error);
      return null;
    }

    if (bodyNode) {
      for (const member of memberNodes(bodyNode)) {
        this.guard(file, member, () => this.buildMember(file, cls, member));
      }
    }

    return cls;
  }

  private buildMember(file: FileEntity, cls: ClassEntity, node: N): void {
    if (METHOD_NODES.has(node.type)) {
      const method = this.buildMethod(file, cls, node);
      const registered = this.registry.register(method);
      if (!registered.ok) {
        this.issue(file, node, registered.error);
        return;
      }
      cls.methods.set(method.umid, method);
    } else if (FIELD_NODES.has(node.type)) {
      const field = buildField(cls, node);
      if (cls.fields.has(field.id)) {
        this.issue(file, node, `Duplicate field id: ${field.id}`);
        return;
      }
      cls.fields.set(field.id, field);
    } else if (node.type in CLASS_NODE_KINDS) {
      const nested = this.buildClass(file, node, cls.ucid);
      if (nested) cls.classes.set(nested.ucid, nested);
    } else if (node.type === "enum_constant" && cls.kind === "enum") {
      const name = node.childForFieldName("name")?.text ?? UNKNOWN_IDENTIFIER;
      const args = node.childForFieldName("arguments")?.text ?? "";
      cls.constants.push(`${name}${args}`);
    }
  }

  private buildMethod(file: FileEntity, cls: ClassEntity, node: N): MethodEntity {
    const isConstructor = node.type === "constructor_declaration";
    const identifier = isConstructor
      ? CONSTRUCTOR_IDENTIFIER
      : node.childForFieldName("name")?.text ?? CONSTRUCTOR_IDENTIFIER;

    const returnType = node.childForFieldName("type")?.text ?? (isConstructor ? cls.identifier : "void");
    const modifiers = parseModifiers(findChild(node, "modifiers"));
    const typeParameters = typeParameterList(findChild(node, "type_parameters"));
    const throws = findChild(node, "throws")?.text;

    const params = parameterList(node.childForFieldName("parameters"));
    const parameters = params.map((p) => p.text);
    const parameterTypes = params.map(parameterType);

    const bodyNode = node.childForFieldName("body");
    const body = bodyNode?.text ?? "";

    return {
      kind: isConstructor ? "constructor" : "method",
      umid: makeUmid(cls.ucid, identifier, parameterTypes),
      scopedIdentifier: makeScopedIdentifier(cls.ucid, identifier),
      ucid: cls.ucid,
      identifier,
      returnType,
      parameters,
      parameterTypes,
      arity: parameters.length,
      typeParameters,
      modifiers,
      throws,
      signature: methodSignature({ modifiers, returnType, identifier, typeParameters, parameters, throws }),
      body,
      bodyHash: computeBodyHash(body),
      line: node.startPosition.row + 1,
      rawDependencies: bodyNode ? this.extractCalls(file, bodyNode) : [],
      dependencies: [],
      unresolvedDependencies: [],
      description: "",
      confidence: 0,
    };
  }

  /**
   * Call sites in a body, deduplicated by name and argument count.
   */
  private extractCalls(file: FileEntity, body: N): RawDependency[] {
    const captured = this.provider.capture(body, CALL_QUERY);
    if (!captured.ok) {
      this.issue(file, body, `Call query failed: ${captured.error.message}`);
      return [];
    }

    const calls = new Map<string, RawDependency>();
    for (const call of captured.value.get("call") ?? []) {
      const name = call.childForFieldName("name")?.text;
      if (!name) continue;
      const arity = callArity(call.childForFieldName("arguments"));
      const key = `${name}/${arity}`;
      if (!calls.has(key)) {
        calls.set(key, { name, arity });
      }
    }
    return [...calls.values()];
  }

  private guard(file: FileEntity, node: N, build: () => void): void {
    const result = tryCatch(build);
    if (!result.ok) {
      this.issue(file, node, result.error.message);
    }
  }

  private issue(file: FileEntity, node: N, message: string): void {
    file.issues.push({ ufid: file.ufid, node: node.type, line: node.startPosition.row + 1, message });
  }
}

/**
 * Builds a field from its first declarator; `int x, y;` yields only `x`.
 */
function buildField<N extends SyntaxNodeOf<N>>(cls: ClassEntity, node: N): FieldEntity {
  const type = node.childForFieldName("type")?.text ?? UNKNOWN_IDENTIFIER;
  const declarator = node.childForFieldName("declarator");
  const identifier = declarator?.childForFieldName("name")?.text ?? UNKNOWN_IDENTIFIER;
  const value = declarator?.childForFieldName("value")?.text;
  const modifiers = parseModifiers(findChild(node, "modifiers"));

  return {
    kind: "field",
    id: makeFieldId(cls.ucid, identifier),
    identifier,
    type,
    signature: fieldSignature({ modifiers, type, identifier, value }),
    modifiers,
  };
}

function findChild<N extends SyntaxNodeOf<N>>(node: N, types: string | ReadonlySet<string>): N | undefined {
  return node.children.find((child) => (typeof types === "string" ? child.type === types : types.has(child.type)));
}

/**
 * Class body members; enum members after the constant list are flattened in.
 */
function memberNodes<N extends SyntaxNodeOf<N>>(body: N): N[] {
  return body.children.flatMap((child) => (child.type === ENUM_MEMBERS_NODE ? [...child.children] : [child]));
}

function importText<N extends SyntaxNodeOf<N>>(node: N): string | undefined {
  const name = findChild(node, NAME_NODES)?.text;
  if (!name) return undefined;
  return node.children.some((child) => child.type === "asterisk") ? `${name}.*` : name;
}

function typeParameterList<N extends SyntaxNodeOf<N>>(node: N | undefined): string[] {
  if (!node) return [];
  return node.children.filter((child) => child.type === "type_parameter").map((child) => child.text);
}

/**
 * Types of an `implements`/`extends` clause, read from its type_list.
 */
function typeList<N extends SyntaxNodeOf<N>>(clause: N | undefined): string[] {
  const list = clause ? findChild(clause, "type_list") : undefined;
  if (!list) return [];
  return list.children.filter((child) => child.type !== ",").map((child) => child.text);
}

function parameterList<N extends SyntaxNodeOf<N>>(node: N | null): N[] {
  if (!node) return [];
  return node.children.filter((child) => PARAMETER_NODES.has(child.type));
}

/**
 * Declared type of a parameter; varargs keep their `...`.
 */
function parameterType<N extends SyntaxNodeOf<N>>(param: N): string {
  if (param.type === "spread_parameter") {
    const type = param.children.find((child) => child.type !== "modifiers" && child.type !== "...");
    return `${type?.text ?? UNKNOWN_IDENTIFIER}...`;
  }
  const type = param.childForFieldName("type")?.text ?? UNKNOWN_IDENTIFIER;
  const dimensions = param.childForFieldName("dimensions")?.text ?? "";
  return `${type}${dimensions}`;
}

function stripKeyword(text: string, keyword: string): string {
  const trimmed = text.trim();
  return trimmed.startsWith(keyword) ? trimmed.slice(keyword.length).trim() : trimmed;
}
