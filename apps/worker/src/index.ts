import { DocsenseError, errorMessage, getLogger } from "@core";
import { loadConfig, loadEnvFiles } from "./config";
import { run } from "./runner";

loadEnvFiles();

const log = getLogger("worker");

async function main(): Promise<void> {
  const started = Date.now();
  const config = loadConfig();
  const written = await run(config);
  log.info("run.done", { mode: config.mode, files: written.length, seconds: ((Date.now() - started) / 1000).toFixed(2) });
}

main().catch((e: unknown) => {
  log.error("run.failed", { code: e instanceof DocsenseError ? e.code : "internal", error: errorMessage(e) });
  process.exit(1);
});
