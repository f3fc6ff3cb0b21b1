import type { Result } from "@codebrief/core";

import type { AnnotationError, AnnotationRequest, AnnotationResponse } from "../model.js";

/**
 * Port for the external service that describes a class and its methods.
 * Failures are returned, never thrown, and say whether a retry may help.
 */
export interface AnnotationGenerator {
  generate(request: AnnotationRequest): Promise<Result<AnnotationResponse, AnnotationError>>;
}
