export * from "./types";
export * from "./errors";
export * from "./analysis/index";
export * from "./ingest/index";
export * from "./validation/output";
export * from "./utils";
export { getLogger } from "./logger";
export type { Logger, LogContext } from "./logger";
