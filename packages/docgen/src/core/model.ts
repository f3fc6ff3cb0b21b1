/**
 * Request and response shapes exchanged with the annotation generator,
 * and the report of an annotation pass.
 */

import type { AnnotationResponse } from "./schemas.js";

/** A nested class as seen from its parent's request */
export interface ChildSummary {
  signature: string;
  description: string;
}

/**
 * Sent when no method of the class has a cached description: the whole
 * class source plus an index for every method signature.
 */
export interface ColdRequest {
  mode: "cold";
  id: string;
  signature: string;
  code: string;
  imports: string[];
  /** Method index to signature */
  methods: Record<string, string>;
  children: ChildSummary[];
}

/**
 * Sent when some descriptions are cached: only the dirty methods carry
 * code; clean ones are given as context.
 */
export interface WarmRequest {
  mode: "warm";
  id: string;
  signature: string;
  fields: string[];
  /** Method index to cached description */
  cached: Record<string, string>;
  /** Method index to the code to describe */
  dirty: Record<string, { signature: string; body: string }>;
  imports: string[];
  children: ChildSummary[];
}

export type AnnotationRequest = ColdRequest | WarmRequest;

export type AnnotationErrorKind = "transient" | "terminal";

export interface AnnotationError {
  kind: AnnotationErrorKind;
  message: string;
  /** HTTP status, when the failure came from the service */
  status?: number;
}

export function terminalError(message: string, status?: number): AnnotationError {
  return status === undefined ? { kind: "terminal", message } : { kind: "terminal", message, status };
}

export function transientError(message: string, status?: number): AnnotationError {
  return status === undefined ? { kind: "transient", message } : { kind: "transient", message, status };
}

export type { AnnotationResponse };

export interface ClassOutcome {
  ucid: string;
  status: "generated" | "error";
  attempts: number;
  /** Methods that received a description */
  described: number;
  /** Requested methods the response left out; they stay dirty */
  missing: number;
  error?: string;
}

export interface AnnotationReport {
  scheduled: number;
  generated: number;
  failed: number;
  /** Classes whose descriptions were all cached */
  skipped: number;
  outcomes: ClassOutcome[];
}
