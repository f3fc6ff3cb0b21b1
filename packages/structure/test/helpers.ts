import {
  type MethodEntity,
  type Modifiers,
  type RawDependency,
  type SourceUnit,
  makeScopedIdentifier,
  makeUmid,
} from "../src/index.js";

export const NO_MODIFIERS: Modifiers = {
  visibility: "package-private",
  isAbstract: false,
  isStatic: false,
  isFinal: false,
  isSynchronized: false,
  isVolatile: false,
};

/**
 * A bare method entity for registry and resolver tests.
 */
export function makeMethod(
  ucid: string,
  identifier: string,
  parameterTypes: string[] = [],
  calls: RawDependency[] = []
): MethodEntity {
  return {
    kind: "method",
    umid: makeUmid(ucid, identifier, parameterTypes),
    scopedIdentifier: makeScopedIdentifier(ucid, identifier),
    ucid,
    identifier,
    returnType: "void",
    parameters: parameterTypes.map((type, i) => `${type} p${i}`),
    parameterTypes,
    arity: parameterTypes.length,
    typeParameters: [],
    modifiers: NO_MODIFIERS,
    signature: `void ${identifier}(${parameterTypes.join(", ")})`,
    body: "{}",
    bodyHash: "",
    line: 1,
    rawDependencies: calls,
    dependencies: [],
    unresolvedDependencies: [],
    description: "",
    confidence: 0,
  };
}

export function unit(ufid: string, source: string): SourceUnit {
  return { ufid, source };
}
