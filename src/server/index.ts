import { randomUUID } from 'node:crypto';
import { Hono, type Context } from 'hono';
import { cors } from 'hono/cors';
import { z } from 'zod';
import type { Turn } from '../agent/index.js';

interface StubSession {
  fileName: string;
  fullFile: string;
  history: Turn[];
}

const startSessionSchema = z.object({
  file_name: z.string(),
  full_file: z.string(),
});

const snippetSchema = z.object({
  session_id: z.string(),
  snippet: z.string().nullish(),
  question: z.string().nullish(),
  programming_lang: z.string().nullish(),
});

type SnippetBody = z.infer<typeof snippetSchema>;

function fenced(code: string, lang: string | null | undefined): string {
  return `\`\`\`${lang ?? ''}\n${code}\n\`\`\``;
}

/**
 * Stand-in for the assistant server. It keeps sessions in memory and answers
 * every request by echoing the snippet back, so the client can be exercised
 * without a model behind it.
 */
export function createStubApp(): Hono {
  const app = new Hono();
  const sessions = new Map<string, StubSession>();

  app.use('*', cors({
    origin: (origin) => /^http:\/\/(localhost|127\.0\.0\.1)(:\d+)?$/.test(origin) ? origin : null,
  }));

  async function readSnippet(c: Context): Promise<{ body: SnippetBody; session: StubSession } | Response> {
    let raw: unknown;
    try {
      raw = await c.req.json();
    } catch {
      return c.json({ detail: 'Invalid JSON in request body' }, 400);
    }
    const parsed = snippetSchema.safeParse(raw);
    if (!parsed.success) {
      return c.json({ detail: 'Missing required fields' }, 422);
    }
    const session = sessions.get(parsed.data.session_id);
    if (!session) {
      return c.json({ detail: 'Session not found' }, 404);
    }
    return { body: parsed.data, session };
  }

  app.post('/start_session', async (c) => {
    let raw: unknown;
    try {
      raw = await c.req.json();
    } catch {
      return c.json({ detail: 'Invalid JSON in request body' }, 400);
    }
    const parsed = startSessionSchema.safeParse(raw);
    if (!parsed.success) {
      return c.json({ detail: 'Missing required fields' }, 422);
    }
    const sessionId = randomUUID();
    sessions.set(sessionId, { fileName: parsed.data.file_name, fullFile: parsed.data.full_file, history: [] });
    console.log(`[snippet-assist] Started session ${sessionId} for file ${parsed.data.file_name}`);
    return c.json({ session_id: sessionId });
  });

  app.post('/explain', async (c) => {
    const req = await readSnippet(c);
    if (req instanceof Response) return req;
    const snippet = req.body.snippet ?? '';
    const explanation = req.body.question ? `${req.body.question}\n${snippet}` : snippet;
    req.session.history.push({ role: 'user', content: snippet }, { role: 'assistant', content: explanation });
    return c.json({ explanation });
  });

  app.post('/fix', async (c) => {
    const req = await readSnippet(c);
    if (req instanceof Response) return req;
    const snippet = req.body.snippet ?? '';
    const fixedCode = fenced(snippet, req.body.programming_lang);
    req.session.history.push({ role: 'user', content: snippet }, { role: 'assistant', content: fixedCode });
    return c.json({ fixed_code: fixedCode });
  });

  app.post('/method_completion', async (c) => {
    const req = await readSnippet(c);
    if (req instanceof Response) return req;
    const snippet = req.body.snippet ?? '';
    const completedMethod = fenced(snippet, req.body.programming_lang);
    req.session.history.push({ role: 'user', content: snippet }, { role: 'assistant', content: completedMethod });
    return c.json({ completed_method: completedMethod });
  });

  app.post('/summary', async (c) => {
    const req = await readSnippet(c);
    if (req instanceof Response) return req;
    return c.json({ explanation: req.session.fullFile });
  });

  app.post('/get_full_explanation', (c) => {
    const sessionId = c.req.query('session_id');
    const session = sessionId ? sessions.get(sessionId) : undefined;
    if (!session) {
      return c.json({ detail: 'Session not found' }, 404);
    }
    const fullExplanation = session.history
      .filter((turn) => turn.role === 'assistant')
      .map((turn) => turn.content)
      .join('\n\n');
    return c.json({ full_explanation: fullExplanation });
  });

  return app;
}
