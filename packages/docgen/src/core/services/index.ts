export { DescriptionOrchestrator, type OrchestratorOptions } from "./DescriptionOrchestrator.js";
export {
  DocgenService,
  type DocgenDependencies,
  type IndexSummary,
  type AnnotateSummary,
  type CallerView,
} from "./DocgenService.js";
export { prepareRequest, needsAnnotation, type PreparedRequest } from "./payloads.js";
export { withRetry, backoffDelay, sleep, type RetryPolicy, type RetryOutcome, type Sleep } from "./retry.js";
