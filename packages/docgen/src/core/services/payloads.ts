import type { ClassEntity, MethodEntity } from "@codebrief/structure";

import type { AnnotationRequest, ChildSummary } from "../model.js";

/**
 * A request plus the index assignment it was built with. Merge-back uses
 * these slots, never a fresh walk of the class, so concurrent changes
 * elsewhere cannot shift an index.
 */
export interface PreparedRequest {
  request: AnnotationRequest;
  slots: ReadonlyMap<number, MethodEntity>;
  /** Indices the generator was asked to describe */
  requested: ReadonlySet<number>;
}

/**
 * Shape the request for one class. Without any cached method description
 * the whole class is sent (cold); otherwise only dirty method bodies are
 * sent, with the cached descriptions as context (warm).
 */
export function prepareRequest(cls: ClassEntity, imports: readonly string[]): PreparedRequest {
  const slots = new Map<number, MethodEntity>();
  [...cls.methods.values()].forEach((method, index) => slots.set(index, method));

  const children: ChildSummary[] = [...cls.classes.values()].map((child) => ({
    signature: child.signature,
    description: child.description,
  }));

  const isWarm = [...slots.values()].some((method) => method.description !== "");
  if (!isWarm) {
    const methods: Record<string, string> = {};
    for (const [index, method] of slots) {
      methods[index] = method.signature;
    }
    return {
      request: {
        mode: "cold",
        id: cls.ucid,
        signature: cls.signature,
        code: cls.body,
        imports: [...imports],
        methods,
        children,
      },
      slots,
      requested: new Set(slots.keys()),
    };
  }

  const cached: Record<string, string> = {};
  const dirty: Record<string, { signature: string; body: string }> = {};
  const requested = new Set<number>();
  for (const [index, method] of slots) {
    if (method.description === "") {
      dirty[index] = { signature: method.signature, body: method.body };
      requested.add(index);
    } else {
      cached[index] = method.description;
    }
  }

  return {
    request: {
      mode: "warm",
      id: cls.ucid,
      signature: cls.signature,
      fields: [...cls.fields.values()].map((field) => field.signature),
      cached,
      dirty,
      imports: [...imports],
      children,
    },
    slots,
    requested,
  };
}

/**
 * A class needs a generator call when its own description or any of its
 * methods' descriptions is missing.
 */
export function needsAnnotation(cls: ClassEntity): boolean {
  if (cls.description === "") {
    return true;
  }
  for (const method of cls.methods.values()) {
    if (method.description === "") return true;
  }
  return false;
}
