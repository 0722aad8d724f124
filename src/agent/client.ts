import { z } from 'zod';
import { describeError, fail, ok, type Result } from '../errors.js';
import type { Operation, SnippetRequest } from './index.js';

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface ClientOptions {
  baseUrl: string;
  /** Milliseconds before a request is aborted. */
  timeout: number;
  fetch?: FetchLike;
}

const startSessionSchema = z.object({ session_id: z.string().min(1) });
const transcriptSchema = z.object({ full_explanation: z.string() });
const errorBodySchema = z.object({ detail: z.string() });

type FieldSchema = z.ZodType<string, z.ZodTypeDef, unknown>;

const explanation: FieldSchema = z.object({ explanation: z.string() }).transform((b) => b.explanation);
const fixedCode: FieldSchema = z.object({ fixed_code: z.string() }).transform((b) => b.fixed_code);
const completedMethod: FieldSchema = z
  .object({ completed_method: z.string() })
  .transform((b) => b.completed_method);

interface Endpoint {
  path: string;
  field: string;
  schema: FieldSchema;
}

export const ENDPOINTS: Record<Operation, Endpoint> = {
  explain: { path: '/explain', field: 'explanation', schema: explanation },
  fix: { path: '/fix', field: 'fixed_code', schema: fixedCode },
  complete: { path: '/method_completion', field: 'completed_method', schema: completedMethod },
  summary: { path: '/summary', field: 'explanation', schema: explanation },
};

/**
 * HTTP boundary to the assistant server. Every response body is validated here
 * and handed back as a tagged result; callers never see raw JSON.
 */
export class AssistantClient {
  private readonly baseUrl: string;
  private readonly timeout: number;
  private readonly fetchImpl: FetchLike;

  constructor(opts: ClientOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, '');
    this.timeout = opts.timeout;
    this.fetchImpl = opts.fetch ?? ((input, init) => fetch(input, init));
  }

  async startSession(fileName: string, fullFile: string, signal?: AbortSignal): Promise<Result<string>> {
    const res = await this.post('/start_session', { file_name: fileName, full_file: fullFile }, signal);
    if (!res.ok) return res;
    const parsed = startSessionSchema.safeParse(res.value);
    if (!parsed.success) {
      return fail('UnexpectedResponseShape', 'Response is missing session_id');
    }
    return ok(parsed.data.session_id);
  }

  async send(
    operation: Operation,
    sessionId: string,
    req: SnippetRequest,
    signal?: AbortSignal,
  ): Promise<Result<string>> {
    const endpoint = ENDPOINTS[operation];
    const body: Record<string, string> = { session_id: sessionId, snippet: req.snippet, programming_lang: req.language };
    if (req.question) body.question = req.question;

    const res = await this.post(endpoint.path, body, signal);
    if (!res.ok) return res;
    const parsed = endpoint.schema.safeParse(res.value);
    if (!parsed.success) {
      return fail('UnexpectedResponseShape', `Response is missing ${endpoint.field}`);
    }
    return ok(parsed.data);
  }

  async transcript(sessionId: string, signal?: AbortSignal): Promise<Result<string>> {
    const query = new URLSearchParams({ session_id: sessionId });
    const res = await this.post(`/get_full_explanation?${query.toString()}`, undefined, signal);
    if (!res.ok) return res;
    const parsed = transcriptSchema.safeParse(res.value);
    if (!parsed.success) {
      return fail('UnexpectedResponseShape', 'Response is missing full_explanation');
    }
    return ok(parsed.data.full_explanation);
  }

  private async post(path: string, payload: unknown, signal?: AbortSignal): Promise<Result<unknown>> {
    if (signal?.aborted) {
      return fail('Cancelled', 'Request cancelled');
    }

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeout);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const res = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: payload === undefined ? undefined : JSON.stringify(payload),
        signal: controller.signal,
      });
      const text = await res.text();

      if (!res.ok) {
        return fail('RequestFailure', `${path} returned HTTP ${res.status}: ${errorDetail(text)}`);
      }

      try {
        const data: unknown = JSON.parse(text);
        return ok(data);
      } catch (err) {
        return fail('RequestFailure', 'Failed to parse server response', err);
      }
    } catch (err) {
      if (signal?.aborted) {
        return fail('Cancelled', 'Request cancelled', err);
      }
      if (timedOut) {
        return fail('RequestFailure', `${path} timed out after ${this.timeout}ms`, err);
      }
      return fail('RequestFailure', `${path} failed: ${describeError(err)}`, err);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}

function errorDetail(text: string): string {
  try {
    const parsed = errorBodySchema.safeParse(JSON.parse(text));
    if (parsed.success) return parsed.data.detail;
  } catch {
    // not JSON; fall through to the raw body
  }
  return text.trim() || 'empty body';
}
