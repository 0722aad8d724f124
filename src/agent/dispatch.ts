import type { Result } from '../errors.js';
import type { AssistantClient } from './client.js';
import type { Operation } from './index.js';

export interface DispatchOptions {
  question?: string;
  signal?: AbortSignal;
}

/**
 * Sends one operation request per call. Requests on the same session run one
 * after another in call order; a request never overlaps an earlier one.
 */
export class RequestDispatcher {
  private readonly tails = new Map<string, Promise<unknown>>();

  constructor(private readonly client: AssistantClient) {}

  dispatch(
    operation: Operation,
    sessionId: string,
    snippet: string,
    language: string,
    opts: DispatchOptions = {},
  ): Promise<Result<string>> {
    const request = operation === 'explain' && opts.question
      ? { snippet, language, question: opts.question }
      : { snippet, language };
    return this.enqueue(sessionId, () => this.client.send(operation, sessionId, request, opts.signal));
  }

  transcript(sessionId: string, signal?: AbortSignal): Promise<Result<string>> {
    return this.enqueue(sessionId, () => this.client.transcript(sessionId, signal));
  }

  get pendingSessions(): number {
    return this.tails.size;
  }

  private enqueue(sessionId: string, run: () => Promise<Result<string>>): Promise<Result<string>> {
    const previous = this.tails.get(sessionId) ?? Promise.resolve();
    const next = previous.then(run, run);
    this.tails.set(sessionId, next);
    const settle = () => {
      if (this.tails.get(sessionId) === next) {
        this.tails.delete(sessionId);
      }
    };
    void next.then(settle, settle);
    return next;
  }
}
