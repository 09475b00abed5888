import { z } from "zod";
import {
  analyzePersonaBatch,
  cleanTextForJson,
  DocsenseError,
  DocumentModel,
  documentFromText,
  extractStructure,
  formatIssues,
  ingestBuffer,
  PersonaAnalysisOutput,
  StructureOutput,
  validateOutput,
  ValidationError,
} from "@core";

export const requestDocumentSchema = z
  .object({
    name: z.string().min(1),
    mime: z.string().optional(),
    data_base64: z.string().min(1).optional(),
    text: z.string().optional(),
  })
  .refine((d) => d.data_base64 !== undefined || d.text !== undefined, {
    message: "data_base64 or text required",
  });

export type RequestDocument = z.infer<typeof requestDocumentSchema>;

export const analyzeRequestSchema = z.object({
  persona: z.string(),
  job_to_be_done: z.string(),
  documents: z.array(requestDocumentSchema),
});

export type AnalyzeRequest = z.infer<typeof analyzeRequestSchema>;

function parseBody<T>(schema: z.ZodType<T>, body: unknown): T {
  const parsed = schema.safeParse(body);
  if (!parsed.success) throw new ValidationError("invalid_request", formatIssues(parsed.error));
  return parsed.data;
}

export async function loadRequestDocument(doc: RequestDocument, maxPages?: number): Promise<DocumentModel> {
  if (doc.data_base64 !== undefined) {
    return ingestBuffer(Buffer.from(doc.data_base64, "base64"), { filename: doc.name, mime: doc.mime, maxPages });
  }
  return documentFromText(cleanTextForJson(doc.text ?? ""), { filename: doc.name });
}

export async function handleStructure(body: unknown, maxPages?: number): Promise<StructureOutput> {
  const doc = await loadRequestDocument(parseBody(requestDocumentSchema, body), maxPages);
  return validateOutput("structure", extractStructure(doc));
}

export async function handleAnalyze(body: unknown, maxPages?: number): Promise<PersonaAnalysisOutput> {
  const req = parseBody(analyzeRequestSchema, body);
  const { output } = await analyzePersonaBatch(
    req.documents,
    (d) => loadRequestDocument(d, maxPages),
    req.persona,
    req.job_to_be_done
  );
  return validateOutput("persona", output);
}

export function statusFor(e: unknown): number {
  if (!(e instanceof DocsenseError)) return 500;
  switch (e.code) {
    case "invalid_request":
    case "missing_input":
    case "document_load_failed":
      return 400;
    case "no_documents":
      return 422;
    default:
      return 500;
  }
}
