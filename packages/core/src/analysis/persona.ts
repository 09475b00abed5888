import type { AnalysisOptions, DocumentModel, PersonaAnalysisOutput } from "../types";
import { DEFAULT_ANALYSIS_OPTIONS } from "../types";
import { getLogger } from "../logger";
import { errorMessage, MissingInputError, NoDocumentsError } from "../errors";
import { segmentDocument } from "./sections";
import { rankSections, toExtractedSection } from "./ranking";
import { analyzeSubsections, toSubsectionAnalysis } from "./refine";
import type { BatchFailure, DocumentLoader } from "./structure";

const MIN_BATCH = 3;
const MAX_BATCH = 10;

export function requirePersonaInputs(persona: string | undefined, job: string | undefined): { persona: string; job: string } {
  if (!persona || !persona.trim()) throw new MissingInputError("persona");
  if (!job || !job.trim()) throw new MissingInputError("job_to_be_done");
  return { persona, job };
}

export function analyzeDocuments(
  docs: DocumentModel[],
  persona: string,
  job: string,
  options: Partial<AnalysisOptions> = {},
  now: Date = new Date()
): PersonaAnalysisOutput {
  const opts: AnalysisOptions = { ...DEFAULT_ANALYSIS_OPTIONS, ...options };
  const log = getLogger("core").child({ mode: "persona" });

  const sections = docs.flatMap((d) => segmentDocument(d, opts.minSectionLength));
  const ranked = rankSections(sections, persona, job, opts.topSections);
  const excerpts = analyzeSubsections(ranked, persona, job, {
    sections: opts.refineSections,
    keyPoints: opts.keyPointsPerSection,
    maxExcerpts: opts.maxExcerpts,
  });
  log.info("persona.analysis.done", { documents: docs.length, sections: sections.length, ranked: ranked.length, excerpts: excerpts.length });

  return {
    metadata: {
      input_documents: docs.map((d) => d.name),
      persona,
      job_to_be_done: job,
      processing_timestamp: now.toISOString(),
    },
    extracted_sections: ranked.map((s) => toExtractedSection(s, opts.sectionTextLimit)),
    subsection_analysis: excerpts.map(toSubsectionAnalysis),
  };
}

export async function loadDocuments<T extends { name: string }>(
  inputs: T[],
  load: DocumentLoader<T>
): Promise<{ docs: DocumentModel[]; failures: BatchFailure[] }> {
  const log = getLogger("core").child({ mode: "persona" });
  const docs: DocumentModel[] = [];
  const failures: BatchFailure[] = [];
  for (const input of inputs) {
    try {
      log.info("persona.document.load", { document: input.name });
      docs.push(await load(input));
    } catch (e) {
      const error = errorMessage(e);
      failures.push({ name: input.name, error });
      log.error("persona.document.error", { document: input.name, error });
    }
  }
  return { docs, failures };
}

/**
 * Persona analysis over a batch: inputs are checked first, documents that fail to load are
 * excluded, and the batch fails only when none load.
 */
export async function analyzePersonaBatch<T extends { name: string }>(
  inputs: T[],
  load: DocumentLoader<T>,
  persona: string | undefined,
  job: string | undefined,
  options: Partial<AnalysisOptions> = {}
): Promise<{ output: PersonaAnalysisOutput; failures: BatchFailure[] }> {
  const log = getLogger("core").child({ mode: "persona" });
  const checked = requirePersonaInputs(persona, job);
  if (inputs.length < MIN_BATCH || inputs.length > MAX_BATCH) {
    log.warn("persona.batch.size", { documents: inputs.length, expected_min: MIN_BATCH, expected_max: MAX_BATCH });
  }
  const { docs, failures } = await loadDocuments(inputs, load);
  if (!docs.length) throw new NoDocumentsError(inputs.length);
  return { output: analyzeDocuments(docs, checked.persona, checked.job, options), failures };
}
