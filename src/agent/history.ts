import type { Role, Turn } from './index.js';

/** Local record of the turns exchanged in each session, keyed by session id. */
export class HistoryStore {
  private readonly histories = new Map<string, Turn[]>();

  init(sessionId: string): void {
    if (!this.histories.has(sessionId)) {
      this.histories.set(sessionId, []);
    }
  }

  append(sessionId: string, role: Role, content: string): void {
    let turns = this.histories.get(sessionId);
    if (!turns) {
      turns = [];
      this.histories.set(sessionId, turns);
    }
    turns.push({ role, content });
  }

  /** A user turn followed by the assistant's reply. */
  appendExchange(sessionId: string, snippet: string, reply: string): void {
    this.append(sessionId, 'user', snippet);
    this.append(sessionId, 'assistant', reply);
  }

  get(sessionId: string): readonly Turn[] {
    return this.histories.get(sessionId) ?? [];
  }

  drop(sessionId: string): void {
    this.histories.delete(sessionId);
  }

  has(sessionId: string): boolean {
    return this.histories.has(sessionId);
  }
}
