import { Err, tryCatchAsync } from "@codebrief/core";
import type { ClassEntity, FileEntity } from "@codebrief/structure";
import pLimit from "p-limit";

import type { AnnotationReport, AnnotationResponse, ClassOutcome } from "../model.js";
import { terminalError } from "../model.js";
import type { AnnotationGenerator } from "../ports/AnnotationGenerator.js";
import { type PreparedRequest, needsAnnotation, prepareRequest } from "./payloads.js";
import { type RetryOutcome, type RetryPolicy, type Sleep, withRetry } from "./retry.js";

export interface OrchestratorOptions {
  /** Most generator calls in flight at once */
  concurrency: number;
  retry: RetryPolicy;
  sleep?: Sleep;
}

interface ClassTask {
  cls: ClassEntity;
  imports: readonly string[];
}

/**
 * Describes every class that is missing a description, one generator call
 * per class, all classes concurrently behind one gate.
 *
 * Each class fails on its own: a failed call marks that class with an
 * error and leaves its entities untouched, and every other class carries on.
 */
export class DescriptionOrchestrator {
  constructor(
    private readonly generator: AnnotationGenerator,
    private readonly options: OrchestratorOptions
  ) {}

  async annotate(files: readonly FileEntity[]): Promise<AnnotationReport> {
    const limit = pLimit(this.options.concurrency);
    const { scheduled, skipped } = collectTasks(files);

    const outcomes = await Promise.all(
      scheduled.map((task) => limit(() => this.annotateClass(task)))
    );

    const generated = outcomes.filter((outcome) => outcome.status === "generated").length;
    return {
      scheduled: scheduled.length,
      generated,
      failed: outcomes.length - generated,
      skipped,
      outcomes,
    };
  }

  private async annotateClass({ cls, imports }: ClassTask): Promise<ClassOutcome> {
    const prepared = prepareRequest(cls, imports);

    const attempted = await tryCatchAsync(() =>
      withRetry(() => this.generator.generate(prepared.request), this.options.retry, {
        sleep: this.options.sleep,
        onRetry: (error, attempt, delayMs) => {
          console.error(
            `[docgen] ${cls.ucid}: attempt ${attempt}/${this.options.retry.maxAttempts} failed (${error.message}); retrying in ${delayMs}ms`
          );
        },
      })
    );

    const { result, attempts }: RetryOutcome<AnnotationResponse> = attempted.ok
      ? attempted.value
      : { result: Err(terminalError(attempted.error.message)), attempts: 1 };

    if (!result.ok) {
      console.error(`[docgen] ${cls.ucid}: annotation failed: ${result.error.message}`);
      cls.annotationStatus = "error";
      cls.annotationError = result.error.message;
      return { ucid: cls.ucid, status: "error", attempts, described: 0, missing: 0, error: result.error.message };
    }

    const { described, missing } = merge(cls, prepared, result.value);
    return { ucid: cls.ucid, status: "generated", attempts, described, missing };
  }
}

/**
 * Walk every class, nested ones included, with an explicit stack. The
 * visited set keeps a class from being scheduled twice in one pass.
 */
function collectTasks(files: readonly FileEntity[]): { scheduled: ClassTask[]; skipped: number } {
  const scheduled: ClassTask[] = [];
  const visited = new Set<string>();
  let skipped = 0;

  for (const file of files) {
    const stack: ClassEntity[] = [...file.classes].reverse();
    while (stack.length > 0) {
      const cls = stack.pop();
      if (!cls || visited.has(cls.ucid)) continue;
      visited.add(cls.ucid);

      if (needsAnnotation(cls)) {
        scheduled.push({ cls, imports: file.imports });
      } else {
        skipped++;
      }
      stack.push(...[...cls.classes.values()].reverse());
    }
  }

  return { scheduled, skipped };
}

/**
 * Write a validated response onto the class and the methods it was asked
 * about. Entries for indices that were not requested are ignored.
 */
function merge(
  cls: ClassEntity,
  prepared: PreparedRequest,
  response: AnnotationResponse
): { described: number; missing: number } {
  const answered = new Set<number>();

  for (const entry of response.methods) {
    const method = prepared.slots.get(entry.method_index);
    if (!method || !prepared.requested.has(entry.method_index)) continue;
    method.description = entry.description;
    method.confidence = entry.confidence;
    answered.add(entry.method_index);
  }

  cls.description = response.description;
  cls.confidence = response.confidence;
  cls.annotationStatus = "generated";
  delete cls.annotationError;

  return { described: answered.size, missing: prepared.requested.size - answered.size };
}
