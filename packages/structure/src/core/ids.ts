/**
 * Identifier formats. These strings key the persisted cache, so they must
 * stay stable across releases.
 */

/** `<scope>.<identifier>`, or just the identifier at top level */
export function makeUcid(scope: string, identifier: string): string {
  return scope ? `${scope}.${identifier}` : identifier;
}

/** `<ucid>#<identifier>(<type>,<type>)` */
export function makeUmid(ucid: string, identifier: string, parameterTypes: readonly string[]): string {
  return `${ucid}#${identifier}(${parameterTypes.join(",")})`;
}

/** `<ucid>.<identifier>`; overloads share it */
export function makeScopedIdentifier(ucid: string, identifier: string): string {
  return `${ucid}.${identifier}`;
}

/** `<ucid>.<identifier>` for fields */
export function makeFieldId(ucid: string, identifier: string): string {
  return `${ucid}.${identifier}`;
}

export const CONSTRUCTOR_IDENTIFIER = "<init>";
export const UNKNOWN_IDENTIFIER = "Unknown";
