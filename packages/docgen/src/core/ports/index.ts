export type { AnnotationGenerator } from "./AnnotationGenerator.js";
