export { GeminiAnnotationGenerator, classifyError, type GeminiOptions } from "./gemini/GeminiAnnotationGenerator.js";
export { ANNOTATION_SYSTEM_PROMPT } from "./gemini/prompts.js";
