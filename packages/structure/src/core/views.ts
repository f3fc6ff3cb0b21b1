/**
 * Plain-object views of the entity model for serialization.
 */

import type { ClassEntity, FieldEntity, FileEntity, MethodEntity, ResolvedDependency } from "./model.js";

export interface MethodView {
  umid: string;
  kind: MethodEntity["kind"];
  identifier: string;
  signature: string;
  returnType: string;
  parameters: string[];
  line: number;
  bodyHash: string;
  dependencies: ResolvedDependency[];
  unresolvedDependencies: string[];
  description: string;
  confidence: number;
}

export interface FieldView {
  id: string;
  identifier: string;
  type: string;
  signature: string;
}

export interface ClassView {
  ucid: string;
  kind: ClassEntity["kind"];
  identifier: string;
  signature: string;
  line: number;
  supertypes: string[];
  constants?: string[];
  fields: FieldView[];
  methods: MethodView[];
  classes: ClassView[];
  description: string;
  confidence: number;
  annotationStatus: ClassEntity["annotationStatus"];
  annotationError?: string;
}

export interface FileView {
  ufid: string;
  package: string;
  imports: string[];
  classes: ClassView[];
}

/**
 * Full structural and dependency view of a file. Bodies are left out.
 */
export function toJson(file: FileEntity): FileView {
  return {
    ufid: file.ufid,
    package: file.package,
    imports: [...file.imports],
    classes: file.classes.map(classView),
  };
}

export function classView(cls: ClassEntity): ClassView {
  const view: ClassView = {
    ucid: cls.ucid,
    kind: cls.kind,
    identifier: cls.identifier,
    signature: cls.signature,
    line: cls.line,
    supertypes: [...cls.supertypes],
    fields: [...cls.fields.values()].map(fieldView),
    methods: [...cls.methods.values()].map(methodView),
    classes: [...cls.classes.values()].map(classView),
    description: cls.description,
    confidence: cls.confidence,
    annotationStatus: cls.annotationStatus,
  };
  if (cls.kind === "enum") {
    view.constants = [...cls.constants];
  }
  if (cls.annotationError) {
    view.annotationError = cls.annotationError;
  }
  return view;
}

export function methodView(method: MethodEntity): MethodView {
  return {
    umid: method.umid,
    kind: method.kind,
    identifier: method.identifier,
    signature: method.signature,
    returnType: method.returnType,
    parameters: [...method.parameters],
    line: method.line,
    bodyHash: method.bodyHash,
    dependencies: method.dependencies.map((dep) => ({ ...dep })),
    unresolvedDependencies: [...method.unresolvedDependencies],
    description: method.description,
    confidence: method.confidence,
  };
}

function fieldView(field: FieldEntity): FieldView {
  return { id: field.id, identifier: field.identifier, type: field.type, signature: field.signature };
}

/**
 * Signature outline of a file with descriptions as trailing comments.
 */
export function toSkeleton(file: FileEntity): string {
  const lines: string[] = [];
  if (file.package) {
    lines.push(`package ${file.package};`, "");
  }
  for (const imported of file.imports) {
    lines.push(`import ${imported};`);
  }
  if (file.imports.length > 0) {
    lines.push("");
  }
  for (const cls of file.classes) {
    skeletonClass(cls, "", lines);
  }
  return lines.join("\n");
}

function skeletonClass(cls: ClassEntity, indent: string, lines: string[]): void {
  lines.push(`${indent}${cls.signature} {${describe(cls.description)}`);
  const inner = `${indent}  `;

  if (cls.kind === "enum" && cls.constants.length > 0) {
    lines.push(`${inner}${cls.constants.join(", ")};`);
  }
  for (const field of cls.fields.values()) {
    lines.push(`${inner}${field.signature};`);
  }
  for (const method of cls.methods.values()) {
    lines.push(`${inner}${method.signature};${describe(method.description)}`);
  }
  for (const nested of cls.classes.values()) {
    skeletonClass(nested, inner, lines);
  }

  lines.push(`${indent}}`);
}

function describe(description: string): string {
  return description ? ` // ${description}` : "";
}
