import { fail, ok, type Result } from '../errors.js';
import type { AssistantClient } from './client.js';
import type { Session } from './index.js';

export interface SessionCreated extends Session {
  fileName: string;
}

/**
 * Document id → remote session id. A session is started on the first request
 * for a document and reused for every request after it. Failures are never
 * cached, so the next request retries from scratch.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, string>();
  private readonly pending = new Map<string, Promise<Result<string>>>();
  private readonly generations = new Map<string, number>();
  private readonly listeners: Array<(created: SessionCreated) => void> = [];

  constructor(private readonly client: AssistantClient) {}

  get(documentId: string): string | undefined {
    return this.sessions.get(documentId);
  }

  has(documentId: string): boolean {
    return this.sessions.has(documentId);
  }

  get size(): number {
    return this.sessions.size;
  }

  onDidCreate(listener: (created: SessionCreated) => void): void {
    this.listeners.push(listener);
  }

  resolve(
    documentId: string,
    fileName: string,
    fullText: string,
    signal?: AbortSignal,
  ): Promise<Result<string>> {
    const cached = this.sessions.get(documentId);
    if (cached !== undefined) {
      return Promise.resolve(ok(cached));
    }
    if (signal?.aborted) {
      return Promise.resolve(fail('Cancelled', 'Request cancelled'));
    }

    let request = this.pending.get(documentId);
    if (!request) {
      // No caller's signal reaches the shared creation.
      const started = this.start(documentId, fileName, fullText).finally(() => {
        if (this.pending.get(documentId) === started) {
          this.pending.delete(documentId);
        }
      });
      this.pending.set(documentId, started);
      request = started;
    }
    return untilAborted(request, signal);
  }

  /**
   * Drop the mapping for a closed document. A creation still in flight for it
   * is not stored when it completes. The remote session is abandoned, not destroyed.
   */
  forget(documentId: string): void {
    this.sessions.delete(documentId);
    this.pending.delete(documentId);
    this.generations.set(documentId, this.generation(documentId) + 1);
  }

  private generation(documentId: string): number {
    return this.generations.get(documentId) ?? 0;
  }

  private async start(documentId: string, fileName: string, fullText: string): Promise<Result<string>> {
    const generation = this.generation(documentId);
    const res = await this.client.startSession(fileName, fullText);
    if (!res.ok) {
      return fail('SessionStartFailure', `Failed to start session: ${res.error.message}`, res.error);
    }
    if (this.generation(documentId) !== generation) {
      return res;
    }
    this.sessions.set(documentId, res.value);
    for (const listener of this.listeners) {
      listener({ documentId, fileName, sessionId: res.value });
    }
    return res;
  }
}

/** Settles with the shared result, or with `Cancelled` as soon as this caller's signal aborts. */
function untilAborted<T>(shared: Promise<Result<T>>, signal?: AbortSignal): Promise<Result<T>> {
  if (!signal) return shared;
  return new Promise((resolve, reject) => {
    const onAbort = () => resolve(fail('Cancelled', 'Request cancelled'));
    signal.addEventListener('abort', onAbort, { once: true });
    shared.then(
      (res) => {
        signal.removeEventListener('abort', onAbort);
        resolve(res);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}
