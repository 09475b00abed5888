import dotenv from "dotenv";
import path from "path";
import fs from "fs";
import { z } from "zod";
import { formatIssues, getLogger, ValidationError } from "@core";
import { createApp } from "./app";

// Load env from repo root first, then allow app-local overrides
const rootEnv = path.resolve(__dirname, "../../../.env");
if (fs.existsSync(rootEnv)) dotenv.config({ path: rootEnv });
dotenv.config();

const envSchema = z.object({
  API_PORT: z.coerce.number().int().positive().default(3001),
  API_BODY_LIMIT: z.string().min(1).default("25mb"),
  MAX_PAGES: z.coerce.number().int().positive().default(200),
});

const logger = getLogger("api");
const parsed = envSchema.safeParse(process.env);
if (!parsed.success) {
  const err = new ValidationError("invalid_config", formatIssues(parsed.error));
  logger.error("api.config.invalid", { error: err.message });
  process.exit(1);
}
const env = parsed.data;

createApp({ bodyLimit: env.API_BODY_LIMIT, maxPages: env.MAX_PAGES }).listen(env.API_PORT, () => {
  logger.info("api.listen", { port: env.API_PORT });
});
