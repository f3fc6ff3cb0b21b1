import { ApiError, GoogleGenAI } from "@google/genai";
import { Err, type Result } from "@codebrief/core";

import {
  type AnnotationError,
  type AnnotationRequest,
  type AnnotationResponse,
  terminalError,
  transientError,
} from "../../core/model.js";
import type { AnnotationGenerator } from "../../core/ports/AnnotationGenerator.js";
import { ANNOTATION_RESPONSE_JSON_SCHEMA, parseAnnotationResponse } from "../../core/schemas.js";
import { ANNOTATION_SYSTEM_PROMPT } from "./prompts.js";

export interface GeminiOptions {
  apiKey: string;
  model: string;
  temperature: number;
}

const TRANSIENT_STATUSES = new Set([408, 429, 500, 502, 503, 504]);
const TRANSIENT_NETWORK_ERRORS = /ECONNRESET|ETIMEDOUT|ECONNREFUSED|EAI_AGAIN|socket hang up|fetch failed/i;

/**
 * Annotation generator backed by the Gemini API in JSON response mode.
 */
export class GeminiAnnotationGenerator implements AnnotationGenerator {
  private readonly client: GoogleGenAI;

  constructor(private readonly options: GeminiOptions) {
    this.client = new GoogleGenAI({ apiKey: options.apiKey });
  }

  async generate(request: AnnotationRequest): Promise<Result<AnnotationResponse, AnnotationError>> {
    let text: string | undefined;
    try {
      const response = await this.client.models.generateContent({
        model: this.options.model,
        contents: JSON.stringify(request),
        config: {
          systemInstruction: ANNOTATION_SYSTEM_PROMPT,
          temperature: this.options.temperature,
          responseMimeType: "application/json",
          responseJsonSchema: ANNOTATION_RESPONSE_JSON_SCHEMA,
        },
      });
      text = response.text;
    } catch (error) {
      return Err(classifyError(error));
    }

    if (!text) {
      return Err(terminalError(`Empty response for ${request.id}`));
    }
    return parseAnnotationResponse(text);
  }
}

/**
 * Rate limits, server errors and dropped connections may succeed on retry;
 * anything else (bad key, bad request) will not.
 */
export function classifyError(error: unknown): AnnotationError {
  if (error instanceof ApiError) {
    return TRANSIENT_STATUSES.has(error.status)
      ? transientError(error.message, error.status)
      : terminalError(error.message, error.status);
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error && error.cause instanceof Error ? error.cause.message : "";
  return TRANSIENT_NETWORK_ERRORS.test(`${message} ${cause}`) ? transientError(message) : terminalError(message);
}
