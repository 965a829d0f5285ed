import { z } from "zod";
import type { TranslationDocument, TranslationNode } from "./types.js";

const TranslationLeafSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const TranslationNodeSchema: z.ZodType<TranslationNode> = z.lazy(() =>
  z.union([
    TranslationLeafSchema,
    z.array(TranslationNodeSchema),
    z.record(z.string(), TranslationNodeSchema),
  ]),
);

export const TranslationDocumentSchema: z.ZodType<TranslationDocument> = z.record(
  z.string(),
  TranslationNodeSchema,
);

/**
 * Render zod issues as "path: message" lines.
 */
export function formatSchemaIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
