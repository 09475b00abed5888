import { z } from "zod";
import { ValidationError } from "../errors";
import type { PersonaAnalysisOutput, StructureOutput } from "../types";

export const headingEntrySchema = z.object({
  level: z.enum(["H1", "H2", "H3"]),
  text: z.string(),
  page: z.number().int(),
});

export const structureOutputSchema = z.object({
  title: z.string(),
  outline: z.array(headingEntrySchema),
});

export const personaOutputSchema = z.object({
  metadata: z.object({
    input_documents: z.array(z.string()),
    persona: z.string().min(1),
    job_to_be_done: z.string().min(1),
    processing_timestamp: z.string().datetime({ offset: true }),
  }),
  extracted_sections: z.array(
    z.object({
      document: z.string(),
      page_number: z.number().int(),
      section_title: z.string(),
      importance_rank: z.number().int().positive(),
      text: z.string().max(500),
    })
  ),
  subsection_analysis: z.array(
    z.object({
      document: z.string(),
      page_number: z.number().int(),
      refined_text: z.string(),
      relevance_score: z.number().int(),
    })
  ),
});

export type OutputKind = "structure" | "persona";

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
}

/** Checks a result against its wire schema; throws ValidationError listing failing paths. */
export function validateOutput(kind: "structure", value: unknown): StructureOutput;
export function validateOutput(kind: "persona", value: unknown): PersonaAnalysisOutput;
export function validateOutput(kind: OutputKind, value: unknown): StructureOutput | PersonaAnalysisOutput {
  const parsed = kind === "structure" ? structureOutputSchema.safeParse(value) : personaOutputSchema.safeParse(value);
  if (!parsed.success) throw new ValidationError("invalid_output", formatIssues(parsed.error));
  return parsed.data;
}
