import type { DocumentModel, StructureOutput } from "../types";
import { getLogger } from "../logger";
import { errorMessage } from "../errors";
import { resolveTitleDetailed } from "./title";
import { classifyHeadings } from "./headings";

export type DocumentLoader<T extends { name: string }> = (input: T) => Promise<DocumentModel>;

export interface BatchFailure {
  name: string;
  error: string;
}

export interface StructureResult {
  name: string;
  output: StructureOutput;
}

export function extractStructure(doc: DocumentModel): StructureOutput {
  const log = getLogger("core").child({ document: doc.name });
  const title = resolveTitleDetailed(doc);
  const outline = classifyHeadings(doc);
  log.debug("structure.extracted", { title_strategy: title.strategy, headings: outline.length, pages: doc.pages.length });
  return { title: title.result, outline };
}

/**
 * Loads and extracts each input in turn. A document that fails to load or extract is
 * logged and skipped; errors thrown by `onResult` abort the batch.
 */
export async function processStructureBatch<T extends { name: string }>(
  inputs: T[],
  load: DocumentLoader<T>,
  onResult?: (result: StructureResult) => Promise<void>
): Promise<{ results: StructureResult[]; failures: BatchFailure[] }> {
  const log = getLogger("core").child({ mode: "structure" });
  const results: StructureResult[] = [];
  const failures: BatchFailure[] = [];
  log.info("structure.batch.start", { documents: inputs.length });

  for (const input of inputs) {
    let result: StructureResult;
    try {
      const doc = await load(input);
      result = { name: input.name, output: extractStructure(doc) };
    } catch (e) {
      const error = errorMessage(e);
      failures.push({ name: input.name, error });
      log.error("structure.document.error", { document: input.name, error });
      continue;
    }
    results.push(result);
    if (onResult) await onResult(result);
    log.info("structure.document.done", { document: input.name, headings: result.output.outline.length });
  }

  log.info("structure.batch.done", { succeeded: results.length, failed: failures.length });
  return { results, failures };
}
