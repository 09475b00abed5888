import fetch from 'node-fetch';
import type { PersonaAnalysisOutput, StructureOutput } from '@core';

export type ClientOptions = { baseUrl: string; apiKey?: string };

export type DocumentPayload = { name: string; mime?: string; data_base64?: string; text?: string };

export type AnalyzePayload = { persona: string; job_to_be_done: string; documents: DocumentPayload[] };

export class ClientError extends Error {
  constructor(readonly status: number, readonly code: string, message: string) {
    super(message);
    this.name = 'ClientError';
  }
}

function field(body: unknown, key: string): string | undefined {
  if (typeof body !== 'object' || body === null || !(key in body)) return undefined;
  const value: unknown = Reflect.get(body, key);
  return typeof value === 'string' ? value : undefined;
}

// Proxies and gateways can answer with HTML or an empty body
function errorBody(text: string): unknown {
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return undefined;
  }
}

export class DocsenseClient {
  constructor(private opts: ClientOptions) {}

  private headers() {
    const h: Record<string, string> = { 'content-type': 'application/json' };
    if (this.opts.apiKey) h['authorization'] = `Bearer ${this.opts.apiKey}`;
    return h;
  }

  // Response bodies are trusted to match the API's validated output shapes.
  private async request<T>(path: string, body?: unknown): Promise<T> {
    const init = body === undefined ? {} : { method: 'POST', headers: this.headers(), body: JSON.stringify(body) };
    const r = await fetch(`${this.opts.baseUrl}${path}`, init);
    if (!r.ok) {
      const detail = errorBody(await r.text());
      throw new ClientError(r.status, field(detail, 'error') ?? 'http_error', field(detail, 'message') ?? `HTTP ${r.status}`);
    }
    const parsed: T = await r.json();
    return parsed;
  }

  health() {
    return this.request<{ ok: boolean }>('/health');
  }

  structure(doc: DocumentPayload) {
    return this.request<StructureOutput>('/structure', doc);
  }

  analyze(req: AnalyzePayload) {
    return this.request<PersonaAnalysisOutput>('/analyze', req);
  }

  static encode(name: string, data: Buffer, mime = 'application/pdf'): DocumentPayload {
    return { name, mime, data_base64: data.toString('base64') };
  }
}
