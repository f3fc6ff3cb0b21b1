/**
 * Entity model for analyzed source units.
 *
 * Entities are plain data. Builders create them, the resolver fills in
 * dependency lists, and the annotation pass writes descriptions.
 */

export type Visibility = "public" | "protected" | "private" | "package-private";

export interface Modifiers {
  visibility: Visibility;
  /** First annotation token among the modifiers, e.g. "@Override" */
  annotation?: string;
  isAbstract: boolean;
  isStatic: boolean;
  isFinal: boolean;
  isSynchronized: boolean;
  isVolatile: boolean;
}

/**
 * A call site found in a method body: the invoked name and how many
 * arguments the call passes.
 */
export interface RawDependency {
  name: string;
  arity: number;
}

export type ResolutionTier = "local" | "import" | "global";

/**
 * A call site resolved to a registered method.
 * `ambiguous` marks one of several candidates the resolver could not tell apart.
 */
export interface ResolvedDependency {
  umid: string;
  tier: ResolutionTier;
  ambiguous: boolean;
}

export type AnnotationStatus = "pending" | "cached" | "generated" | "error";

export interface FieldEntity {
  kind: "field";
  /** `<ucid>.<identifier>` */
  id: string;
  identifier: string;
  type: string;
  signature: string;
  modifiers: Modifiers;
}

export type MethodKind = "method" | "constructor";

export interface MethodEntity {
  kind: MethodKind;
  /** `<ucid>#<identifier>(<parameter types>)` */
  umid: string;
  /** `<ucid>.<identifier>`, shared by all overloads */
  scopedIdentifier: string;
  /** Owning class */
  ucid: string;
  identifier: string;
  returnType: string;
  /** Parameter declarations as written, e.g. "final int count" */
  parameters: string[];
  parameterTypes: string[];
  arity: number;
  typeParameters: string[];
  modifiers: Modifiers;
  throws?: string;
  signature: string;
  body: string;
  bodyHash: string;
  /** 1-indexed line of the declaration */
  line: number;
  rawDependencies: RawDependency[];
  dependencies: ResolvedDependency[];
  unresolvedDependencies: string[];
  description: string;
  /** 0-100 */
  confidence: number;
}

export type TypeKind = "class" | "interface" | "record";

interface ClassEntityBase {
  /** Dot-scoped: package, enclosing classes, identifier */
  ucid: string;
  identifier: string;
  signature: string;
  body: string;
  bodyHash: string;
  line: number;
  modifiers: Modifiers;
  typeParameters: string[];
  supertypes: string[];
  methods: Map<string, MethodEntity>;
  fields: Map<string, FieldEntity>;
  classes: Map<string, ClassEntity>;
  description: string;
  /** 0-100 */
  confidence: number;
  annotationStatus: AnnotationStatus;
  annotationError?: string;
}

export interface TypeEntity extends ClassEntityBase {
  kind: TypeKind;
}

export interface EnumEntity extends ClassEntityBase {
  kind: "enum";
  /** Constants in declaration order, with arguments: "PROCESSING(1)" */
  constants: string[];
}

export type ClassEntity = TypeEntity | EnumEntity;

export type ClassKind = ClassEntity["kind"];

/**
 * Something the builder could not turn into an entity.
 * The rest of the file is still built.
 */
export interface BuildIssue {
  ufid: string;
  /** Syntax node type the issue was found at */
  node: string;
  line: number;
  message: string;
}

export interface FileEntity {
  ufid: string;
  package: string;
  imports: string[];
  classes: ClassEntity[];
  issues: BuildIssue[];
}

/**
 * Depth-first walk over a class and all of its nested classes.
 */
export function* walkClasses(classes: Iterable<ClassEntity>): Generator<ClassEntity> {
  for (const cls of classes) {
    yield cls;
    yield* walkClasses(cls.classes.values());
  }
}

/**
 * All methods declared anywhere in a file, nested classes included.
 */
export function* fileMethods(file: FileEntity): Generator<MethodEntity> {
  for (const cls of walkClasses(file.classes)) {
    yield* cls.methods.values();
  }
}
