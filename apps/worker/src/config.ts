import dotenv from "dotenv";
import path from "path";
import fs from "fs";
import { z } from "zod";
import { errorMessage, formatIssues, MissingInputError, ValidationError } from "@core";

// Load env from repo root first, then allow app-local overrides
export function loadEnvFiles(): void {
  const rootEnv = path.resolve(__dirname, "../../../.env");
  if (fs.existsSync(rootEnv)) dotenv.config({ path: rootEnv });
  dotenv.config();
}

const envSchema = z.object({
  RUN_MODE: z.enum(["structure", "persona"]).default("structure"),
  INPUT_DIR: z.string().min(1).default("/app/input"),
  OUTPUT_DIR: z.string().min(1).default("/app/output"),
  PERSONA: z.string().optional(),
  JOB: z.string().optional(),
  MAX_PAGES: z.coerce.number().int().positive().default(200),
  PERSONA_OUTPUT_FILE: z.string().min(1).default("persona_analysis.json"),
});

export type RunMode = z.infer<typeof envSchema>["RUN_MODE"];

export interface WorkerConfig {
  mode: RunMode;
  inputDir: string;
  outputDir: string;
  persona?: string;
  job?: string;
  maxPages: number;
  personaOutputFile: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): WorkerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) throw new ValidationError("invalid_config", formatIssues(parsed.error));
  const e = parsed.data;
  return {
    mode: e.RUN_MODE,
    inputDir: e.INPUT_DIR,
    outputDir: e.OUTPUT_DIR,
    persona: e.PERSONA?.trim() || undefined,
    job: e.JOB?.trim() || undefined,
    maxPages: e.MAX_PAGES,
    personaOutputFile: e.PERSONA_OUTPUT_FILE,
  };
}

const personaFileSchema = z.object({ persona: z.string() });
const jobFileSchema = z.object({ job: z.string() });

async function readJsonField<T>(file: string, schema: z.ZodType<T>): Promise<T | undefined> {
  if (!fs.existsSync(file)) return undefined;
  const raw = await fs.promises.readFile(file, "utf8");
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    throw new ValidationError("invalid_config", [`${path.basename(file)}: ${errorMessage(e)}`]);
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) throw new ValidationError("invalid_config", formatIssues(parsed.error).map((i) => `${path.basename(file)} ${i}`));
  return parsed.data;
}

/** Persona and job from the environment, else from persona.json / job.json in the input directory. */
export async function resolvePersonaInputs(config: WorkerConfig): Promise<{ persona: string; job: string }> {
  const persona = config.persona
    ?? (await readJsonField(path.join(config.inputDir, "persona.json"), personaFileSchema))?.persona.trim();
  const job = config.job
    ?? (await readJsonField(path.join(config.inputDir, "job.json"), jobFileSchema))?.job.trim();
  if (!persona) throw new MissingInputError("persona");
  if (!job) throw new MissingInputError("job_to_be_done");
  return { persona, job };
}
