// ──────────────────────────────────────────────
// Weft - Workflow document schema
// Wire shape accepted by WorkflowGraph.fromDocument
// ──────────────────────────────────────────────

import { z } from "zod";

export const componentDocumentSchema = z.object({
  obj: z.object({
    component_name: z.string().min(1, "component_name must be a non-empty string"),
    params: z.record(z.unknown()).default({}),
  }),
  downstream: z.array(z.string()).default([]),
  upstream: z.array(z.string()).default([]),
  parent_id: z.string().default(""),
});

export const workflowDocumentSchema = z.object({
  components: z.record(componentDocumentSchema),
  history: z.array(z.tuple([z.enum(["user", "assistant"]), z.string()])).default([]),
  messages: z.array(z.unknown()).default([]),
  reference: z.array(z.unknown()).default([]),
  path: z.array(z.string()).default([]),
  answer: z.array(z.string()).default([]),
});

export type ParsedWorkflowDocument = z.infer<typeof workflowDocumentSchema>;

export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "document"}: ${issue.message}`);
}
