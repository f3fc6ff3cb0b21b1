import type { JavaNode } from "@codebrief/structure";

import type { DocgenService } from "../core/services/DocgenService.js";

/** The pipeline as the tools see it, over the tree-sitter Java provider */
export type JavaService = DocgenService<JavaNode>;
