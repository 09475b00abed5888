import path from "path";
import fs from "fs";
import {
  analyzePersonaBatch,
  DocumentLoader,
  formatFileSize,
  getLogger,
  ingestBuffer,
  NoDocumentsError,
  OutputWriteError,
  processStructureBatch,
  ProgressTracker,
  safeFilename,
  truncateText,
  validateOutput,
} from "@core";
import { resolvePersonaInputs, WorkerConfig } from "./config";

export interface InputFile {
  name: string;
  path: string;
}

const log = getLogger("worker");

export async function listInputFiles(dir: string): Promise<InputFile[]> {
  const entries = await fs.promises.readdir(dir, { withFileTypes: true });
  const files: InputFile[] = [];
  for (const entry of entries) {
    if (!entry.isFile() || !entry.name.toLowerCase().endsWith(".pdf")) continue;
    const full = path.join(dir, entry.name);
    const { size } = await fs.promises.stat(full);
    log.debug("input.file", { name: entry.name, size: formatFileSize(size) });
    files.push({ name: entry.name, path: full });
  }
  return files.sort((a, b) => a.name.localeCompare(b.name));
}

export function pdfFileLoader(maxPages: number): DocumentLoader<InputFile> {
  return async (file) => ingestBuffer(await fs.promises.readFile(file.path), { filename: file.name, mime: "application/pdf", maxPages });
}

export async function writeJson(target: string, data: unknown): Promise<void> {
  try {
    await fs.promises.writeFile(target, JSON.stringify(data, null, 2) + "\n", "utf8");
  } catch (e) {
    throw new OutputWriteError(target, e);
  }
}

export async function runStructureMode(config: WorkerConfig, files: InputFile[], load: DocumentLoader<InputFile>): Promise<string[]> {
  const written: string[] = [];
  const progress = new ProgressTracker(files.length, "Structure extraction", log);
  await processStructureBatch(files, load, async ({ name, output }) => {
    const stem = safeFilename(path.parse(name).name);
    const target = path.join(config.outputDir, `${stem}.json`);
    progress.update();
    // First document in name order keeps a shared output name
    if (written.includes(target)) {
      log.warn("structure.output.collision", { document: name, target });
      return;
    }
    await writeJson(target, validateOutput("structure", output));
    written.push(target);
    log.info("structure.saved", { document: name, target });
  });
  progress.finish();
  return written;
}

export async function runPersonaMode(config: WorkerConfig, files: InputFile[], load: DocumentLoader<InputFile>): Promise<string> {
  const { persona, job } = await resolvePersonaInputs(config);
  log.info("persona.start", { persona: truncateText(persona, 80), job: truncateText(job, 80), documents: files.length });
  const { output, failures } = await analyzePersonaBatch(files, load, persona, job);
  const target = path.join(config.outputDir, config.personaOutputFile);
  await writeJson(target, validateOutput("persona", output));
  log.info("persona.saved", { target, sections: output.extracted_sections.length, excerpts: output.subsection_analysis.length, failed: failures.length });
  return target;
}

/** Runs one batch over the input directory. Returns the files written. */
export async function run(config: WorkerConfig, load: DocumentLoader<InputFile> = pdfFileLoader(config.maxPages)): Promise<string[]> {
  const files = await listInputFiles(config.inputDir);
  if (!files.length) throw new NoDocumentsError(0);
  await fs.promises.mkdir(config.outputDir, { recursive: true });
  log.info("run.start", { mode: config.mode, input_dir: config.inputDir, output_dir: config.outputDir, documents: files.length });
  if (config.mode === "persona") return [await runPersonaMode(config, files, load)];
  return runStructureMode(config, files, load);
}
