import { Err, Ok, type Result } from "@codebrief/core";
import * as z from "zod/v4";

import { type AnnotationError, terminalError } from "./model.js";

const Confidence = z.number().min(0).max(100).describe("How sure the description is, 0-100");

export const MethodAnnotationSchema = z.object({
  method_index: z.number().int().min(0).describe("Index of the method in the request"),
  description: z.string().describe("One or two sentences starting with an active verb"),
  confidence: Confidence,
});

export const AnnotationResponseSchema = z.object({
  id: z.string().describe("The class id from the request"),
  description: z.string().describe("What the class is for, one or two sentences"),
  confidence: Confidence,
  methods: z.array(MethodAnnotationSchema),
});

export type MethodAnnotation = z.infer<typeof MethodAnnotationSchema>;
export type AnnotationResponse = z.infer<typeof AnnotationResponseSchema>;

/** JSON Schema handed to the generator as its response format */
export const ANNOTATION_RESPONSE_JSON_SCHEMA = z.toJSONSchema(AnnotationResponseSchema);

/**
 * Parse and validate the generator's raw JSON text.
 * A response that does not match the schema is a terminal failure.
 */
export function parseAnnotationResponse(text: string): Result<AnnotationResponse, AnnotationError> {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return Err(terminalError(`Response is not JSON: ${reason}`));
  }

  const parsed = AnnotationResponseSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    return Err(terminalError(`Response does not match schema: ${issues.join("; ")}`));
  }
  return Ok(parsed.data);
}
