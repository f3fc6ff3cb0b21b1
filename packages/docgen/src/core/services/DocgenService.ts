import path from "node:path";
import { Err, Ok, type Result, unwrapOr } from "@codebrief/core";
import {
  type CacheStore,
  type ClassView,
  type FileSystem,
  type MethodView,
  type ProjectModel,
  type ProjectScanner,
  type ResolutionTier,
  type SourceUnit,
  type SyntaxNodeOf,
  type SyntaxProvider,
  CacheManager,
  buildProject,
  classView,
  methodView,
  toSkeleton,
} from "@codebrief/structure";

import type { DocgenConfig } from "../config.js";
import type { AnnotationReport } from "../model.js";
import type { AnnotationGenerator } from "../ports/AnnotationGenerator.js";
import { DescriptionOrchestrator } from "./DescriptionOrchestrator.js";
import type { Sleep } from "./retry.js";

export interface DocgenDependencies<N extends SyntaxNodeOf<N>> {
  provider: SyntaxProvider<N>;
  fs: FileSystem;
  scanner: ProjectScanner;
  /** Absent when no credentials are configured */
  generator?: AnnotationGenerator;
  createCacheStore: (cachePath: string) => CacheStore;
  config: DocgenConfig;
  sleep?: Sleep;
}

export interface IndexSummary {
  root: string;
  files: number;
  classes: number;
  methods: number;
  issues: number;
  resolved: number;
  ambiguous: number;
  unresolved: number;
  cleanMethods: number;
  dirtyMethods: number;
}

export interface AnnotateSummary extends AnnotationReport {
  cachePath: string;
  cacheSaved: boolean;
  cacheError?: string;
}

export interface CallerView {
  umid: string;
  signature: string;
  tier: ResolutionTier;
  ambiguous: boolean;
}

interface IndexedProject {
  root: string;
  model: ProjectModel;
  cache: CacheManager;
  store: CacheStore;
  cachePath: string;
}

/**
 * Runs the pipeline over one project: scan, build, resolve, seed from the
 * cache, annotate, save the cache. Lookups read the last indexed model.
 */
export class DocgenService<N extends SyntaxNodeOf<N>> {
  private project: IndexedProject | null = null;
  /** Tail of the index/annotate queue; runs never overlap */
  private queue: Promise<void> = Promise.resolve();
  private annotating: Promise<Result<AnnotateSummary, string>> | null = null;

  constructor(private readonly deps: DocgenDependencies<N>) {}

  isEmpty(): boolean {
    return this.project === null;
  }

  /**
   * Index a project. Waits for a running annotation to finish first.
   */
  index(rootPath: string): Promise<Result<IndexSummary, string>> {
    return this.exclusive(() => this.runIndex(rootPath));
  }

  /**
   * Describe everything that is missing a description, then persist the
   * cache. Individual class failures are reported, not returned as Err.
   * A call made while a run is in progress joins that run.
   */
  annotate(): Promise<Result<AnnotateSummary, string>> {
    if (this.annotating) {
      return this.annotating;
    }
    const run = this.exclusive(() => this.runAnnotate()).finally(() => {
      this.annotating = null;
    });
    this.annotating = run;
    return run;
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async runIndex(rootPath: string): Promise<Result<IndexSummary, string>> {
    const root = path.resolve(rootPath);
    const scanned = await this.deps.scanner.scan(root, this.deps.provider.extensions);
    if (!scanned.ok) {
      return Err(`Failed to scan ${root}: ${scanned.error.message}`);
    }

    const units: SourceUnit[] = [];
    for (const relative of scanned.value) {
      const source = this.deps.fs.read(path.join(root, relative));
      if (source.ok) {
        units.push({ ufid: relative, source: source.value });
      } else {
        console.error(`[docgen] Skipping ${relative}: ${source.error.message}`);
      }
    }

    const built = buildProject(this.deps.provider, units);
    if (!built.ok) {
      return Err(built.error);
    }
    const model = built.value;

    const cachePath = path.resolve(root, this.deps.config.cacheFile);
    const store = this.deps.createCacheStore(cachePath);
    const loaded = store.load();
    if (!loaded.ok) {
      console.error(`[docgen] Ignoring unreadable cache ${cachePath}: ${loaded.error.message}`);
    }
    const cache = new CacheManager(model.registry);
    const cacheStats = cache.load(unwrapOr(loaded, {}));

    this.project = { root, model, cache, store, cachePath };

    const { stats } = model;
    console.error(
      `[docgen] Indexed ${stats.files} files, ${stats.classes} classes, ${stats.methods} methods ` +
        `(${cacheStats.dirtyMethods} need descriptions)`
    );

    return Ok({
      root,
      files: stats.files,
      classes: stats.classes,
      methods: stats.methods,
      issues: stats.issues,
      resolved: stats.resolution.resolved,
      ambiguous: stats.resolution.ambiguous,
      unresolved: stats.resolution.unresolved,
      cleanMethods: cacheStats.cleanMethods,
      dirtyMethods: cacheStats.dirtyMethods,
    });
  }

  private async runAnnotate(): Promise<Result<AnnotateSummary, string>> {
    const project = this.project;
    if (!project) {
      return Err("No project indexed. Call index_project first.");
    }
    const { generator, config, sleep } = this.deps;
    if (!generator) {
      return Err("GEMINI_API_KEY is not set; annotation is unavailable");
    }

    const orchestrator = new DescriptionOrchestrator(generator, {
      concurrency: config.concurrency,
      retry: config.retry,
      sleep,
    });
    const report = await orchestrator.annotate(project.model.files);

    const saved = project.store.save(project.cache.export());
    if (!saved.ok) {
      console.error(`[docgen] Failed to save cache ${project.cachePath}: ${saved.error.message}`);
    }

    console.error(
      `[docgen] Annotated ${report.generated}/${report.scheduled} classes (${report.failed} failed, ${report.skipped} cached)`
    );

    return Ok({
      ...report,
      cachePath: project.cachePath,
      cacheSaved: saved.ok,
      ...(saved.ok ? {} : { cacheError: saved.error.message }),
    });
  }

  getClass(ucid: string): Result<ClassView, string> {
    const cls = this.project?.model.registry.lookupClass(ucid);
    return cls ? Ok(classView(cls)) : Err(this.missing(`Class not found: ${ucid}`));
  }

  getMethod(umid: string): Result<MethodView, string> {
    const method = this.project?.model.registry.lookupByUmid(umid);
    return method ? Ok(methodView(method)) : Err(this.missing(`Method not found: ${umid}`));
  }

  /**
   * Methods whose resolved dependencies include `umid`.
   */
  getCallers(umid: string): Result<CallerView[], string> {
    const registry = this.project?.model.registry;
    if (!registry?.lookupByUmid(umid)) {
      return Err(this.missing(`Method not found: ${umid}`));
    }

    const callers: CallerView[] = [];
    for (const method of registry.methods()) {
      const edge = method.dependencies.find((dep) => dep.umid === umid);
      if (edge) {
        callers.push({ umid: method.umid, signature: method.signature, tier: edge.tier, ambiguous: edge.ambiguous });
      }
    }
    return Ok(callers);
  }

  getSkeleton(ufid: string): Result<string, string> {
    const file = this.project?.model.files.find((f) => f.ufid === ufid);
    return file ? Ok(toSkeleton(file)) : Err(this.missing(`File not found: ${ufid}`));
  }

  private missing(message: string): string {
    return this.project ? message : "No project indexed. Call index_project first.";
  }
}
