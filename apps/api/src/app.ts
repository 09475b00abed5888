import express, { ErrorRequestHandler, Request, RequestHandler } from "express";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";
import { v4 as uuidv4 } from "uuid";
import { DocsenseError, errorMessage, getLogger } from "@core";
import { handleAnalyze, handleStructure, statusFor } from "./handlers";

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      req_id?: string;
    }
  }
}

export interface ApiOptions {
  bodyLimit?: string;
  maxPages?: number;
}

const logger = getLogger("api");

function route(name: string, handler: (req: Request) => Promise<unknown>): RequestHandler {
  return (req, res) => {
    const log = logger.child({ req_id: req.req_id });
    log.info(`${name}.start`);
    handler(req).then(
      (out) => {
        log.info(`${name}.done`);
        res.json(out);
      },
      (e: unknown) => {
        const status = statusFor(e);
        log.error(`${name}.error`, { status, error: errorMessage(e) });
        res.status(status).json({ error: e instanceof DocsenseError ? e.code : "internal", message: errorMessage(e) });
      }
    );
  };
}

// Body parser failures (malformed JSON, oversized payloads) carry their own status
const bodyErrors: ErrorRequestHandler = (err: unknown, req, res, next) => {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number" && err.status < 500) {
    logger.child({ req_id: req.req_id }).warn("request.rejected", { status: err.status, error: errorMessage(err) });
    res.status(err.status).json({ error: "invalid_request", message: errorMessage(err) });
    return;
  }
  next(err);
};

export function createApp(opts: ApiOptions = {}) {
  const app = express();
  app.use(express.json({ limit: opts.bodyLimit ?? "25mb" }));
  app.use(cors());
  app.use(helmet());
  // Only failed requests reach the access log
  app.use(morgan("dev", { skip: (_req, res) => res.statusCode < 400 }));
  app.use((req, _res, next) => {
    req.req_id = req.get("x-request-id") || uuidv4();
    next();
  });

  app.get("/health", (_req, res) => res.json({ ok: true }));
  app.post("/structure", route("structure", (req) => handleStructure(req.body, opts.maxPages)));
  app.post("/analyze", route("analyze", (req) => handleAnalyze(req.body, opts.maxPages)));

  app.use(bodyErrors);
  return app;
}
