import { Err, Ok, type Result } from "@codebrief/core";

import type { ClassEntity, MethodEntity } from "../model.js";

/**
 * Read side of the registry. The resolver, cache manager and annotation
 * pass only get this view.
 */
export interface ReadonlyRegistry {
  readonly sealed: boolean;
  lookupByUmid(umid: string): MethodEntity | undefined;
  lookupByScoped(scopedIdentifier: string): readonly MethodEntity[];
  lookupByShortName(identifier: string): readonly MethodEntity[];
  lookupClass(ucid: string): ClassEntity | undefined;
  methods(): Iterable<MethodEntity>;
  classes(): Iterable<ClassEntity>;
  readonly methodCount: number;
  readonly classCount: number;
}

const EMPTY: readonly MethodEntity[] = Object.freeze([]);

/**
 * Multi-indexed store of every method (and class) built in one run.
 *
 * One registry is created per run and handed to the builder and the
 * resolver. It holds references only; entities belong to their classes.
 * Once sealed, registration is refused, which keeps all resolution behind
 * the build barrier.
 */
export class SymbolRegistry implements ReadonlyRegistry {
  private readonly byUmid = new Map<string, MethodEntity>();
  private readonly byScoped = new Map<string, MethodEntity[]>();
  private readonly byShortName = new Map<string, MethodEntity[]>();
  private readonly byUcid = new Map<string, ClassEntity>();
  private isSealed = false;

  get sealed(): boolean {
    return this.isSealed;
  }

  get methodCount(): number {
    return this.byUmid.size;
  }

  get classCount(): number {
    return this.byUcid.size;
  }

  /**
   * Add a method to all three indices.
   * Registering the same object twice is a no-op; a different method with an
   * already-registered umid is refused before any index changes.
   */
  register(method: MethodEntity): Result<void, string> {
    if (this.isSealed) {
      return Err(`Registry is sealed; cannot register ${method.umid}`);
    }

    const existing = this.byUmid.get(method.umid);
    if (existing === method) {
      return Ok(undefined);
    }
    if (existing) {
      return Err(`Duplicate method id: ${method.umid}`);
    }

    this.byUmid.set(method.umid, method);
    append(this.byScoped, method.scopedIdentifier, method);
    append(this.byShortName, method.identifier, method);
    return Ok(undefined);
  }

  registerClass(cls: ClassEntity): Result<void, string> {
    if (this.isSealed) {
      return Err(`Registry is sealed; cannot register ${cls.ucid}`);
    }

    const existing = this.byUcid.get(cls.ucid);
    if (existing === cls) {
      return Ok(undefined);
    }
    if (existing) {
      return Err(`Duplicate class id: ${cls.ucid}`);
    }

    this.byUcid.set(cls.ucid, cls);
    return Ok(undefined);
  }

  /**
   * Close registration. Called once every file of the run is built.
   */
  seal(): void {
    this.isSealed = true;
  }

  lookupByUmid(umid: string): MethodEntity | undefined {
    return this.byUmid.get(umid);
  }

  lookupByScoped(scopedIdentifier: string): readonly MethodEntity[] {
    return this.byScoped.get(scopedIdentifier) ?? EMPTY;
  }

  lookupByShortName(identifier: string): readonly MethodEntity[] {
    return this.byShortName.get(identifier) ?? EMPTY;
  }

  lookupClass(ucid: string): ClassEntity | undefined {
    return this.byUcid.get(ucid);
  }

  methods(): Iterable<MethodEntity> {
    return this.byUmid.values();
  }

  classes(): Iterable<ClassEntity> {
    return this.byUcid.values();
  }
}

function append(index: Map<string, MethodEntity[]>, key: string, method: MethodEntity): void {
  const list = index.get(key);
  if (list) {
    list.push(method);
  } else {
    index.set(key, [method]);
  }
}
