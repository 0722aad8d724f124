export type Operation = 'explain' | 'fix' | 'complete' | 'summary';

export type Role = 'user' | 'assistant';

export interface Turn {
  role: Role;
  content: string;
}

export interface Session {
  sessionId: string;
  documentId: string;
}

export interface SnippetRequest {
  snippet: string;
  language: string;
  question?: string;
}
