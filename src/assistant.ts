import type { AssistConfig } from './config.js';
import { AssistantClient, type FetchLike } from './agent/client.js';
import { RequestDispatcher } from './agent/dispatch.js';
import { HistoryStore } from './agent/history.js';
import { SessionRegistry } from './agent/session.js';
import { getCommand, type CommandId, type CommandSpec } from './commands.js';
import { applyEdit, type AppliedEdit, type ApplyMode } from './editor/buffer.js';
import { getSelectedText } from './editor/selection.js';
import type { EditorDocument, EditorHost, NotifyLevel, SelectionMarks, Surface } from './editor/types.js';
import { AssistError, type AssistErrorKind, type Result } from './errors.js';
import { ResponseRenderer, type ResponseFormat } from './render/surface.js';

export interface AssistantOptions {
  host: EditorHost;
  config: AssistConfig;
  fetch?: FetchLike;
}

export interface RunOptions {
  /** Extra question sent along with `explain`. */
  question?: string;
  /** How `autofill` writes the completion. Defaults to `replace`. */
  applyMode?: ApplyMode;
  signal?: AbortSignal;
}

export type RunOutcome =
  | { status: 'rendered'; text: string; surface: Surface }
  | { status: 'applied'; text: string; edit: AppliedEdit }
  | { status: 'failed'; error: AssistError };

const SEVERITY: Record<AssistErrorKind, NotifyLevel> = {
  EmptySelection: 'warn',
  SessionStartFailure: 'error',
  RequestFailure: 'error',
  UnexpectedResponseShape: 'warn',
  Cancelled: 'warn',
};

/**
 * One pipeline for every command: selection → session → request → surface or
 * document edit. Failures end up as a single host notification; nothing throws.
 */
export class Assistant {
  readonly sessions: SessionRegistry;
  readonly history: HistoryStore;
  private readonly dispatcher: RequestDispatcher;
  private readonly renderer: ResponseRenderer;
  private readonly host: EditorHost;
  private readonly config: AssistConfig;
  private readonly watched = new Set<string>();

  constructor(opts: AssistantOptions) {
    this.host = opts.host;
    this.config = opts.config;

    const client = new AssistantClient({
      baseUrl: opts.config.base_url,
      timeout: opts.config.timeout,
      fetch: opts.fetch,
    });
    this.sessions = new SessionRegistry(client);
    this.history = new HistoryStore();
    this.dispatcher = new RequestDispatcher(client);
    this.renderer = new ResponseRenderer(opts.host, opts.config.surface);

    this.sessions.onDidCreate(({ fileName, sessionId }) => {
      this.history.init(sessionId);
      this.host.notify('info', `Started assistant session for ${fileName}`);
    });
  }

  explain(opts?: RunOptions): Promise<RunOutcome> {
    return this.run('explain', opts);
  }

  fix(opts?: RunOptions): Promise<RunOutcome> {
    return this.run('fix', opts);
  }

  completeMethod(opts?: RunOptions): Promise<RunOutcome> {
    return this.run('complete', opts);
  }

  autofillMethod(opts?: RunOptions): Promise<RunOutcome> {
    return this.run('autofill', opts);
  }

  summarize(opts?: RunOptions): Promise<RunOutcome> {
    return this.run('summarize', opts);
  }

  async run(id: CommandId, opts: RunOptions = {}): Promise<RunOutcome> {
    const command = getCommand(id);
    const document = this.host.activeDocument();
    if (!document) {
      return this.report(new AssistError('EmptySelection', 'No document is open'));
    }

    const marks = this.host.selection();
    let snippet = '';
    if (command.needsSelection) {
      snippet = getSelectedText(marks, document);
      if (snippet === '') {
        return this.report(new AssistError('EmptySelection', 'No code selected'));
      }
    }

    const session = await this.resolveSession(document, opts.signal);
    if (!session.ok) {
      return this.report(session.error);
    }
    const sessionId = session.value;

    if (this.config.spinner_enabled) {
      this.host.notify('info', 'Processing…');
    }

    const language = this.detectLanguage(document);
    const res = await this.dispatcher.dispatch(command.operation, sessionId, snippet, language, {
      question: opts.question,
      signal: opts.signal,
    });
    if (!res.ok) {
      return this.report(res.error);
    }

    if (command.needsSelection) {
      this.history.appendExchange(sessionId, snippet, res.value);
    }

    if (command.output.kind === 'apply') {
      return this.applyToDocument(document, marks, res.value, opts.applyMode ?? 'replace');
    }
    return this.show(command, res.value, language, command.output.format, document);
  }

  /** Everything the assistant has answered in the active document's session. */
  async transcript(signal?: AbortSignal): Promise<RunOutcome> {
    const document = this.host.activeDocument();
    if (!document) {
      return this.report(new AssistError('EmptySelection', 'No document is open'));
    }
    const session = await this.resolveSession(document, signal);
    if (!session.ok) {
      return this.report(session.error);
    }
    const res = await this.dispatcher.transcript(session.value, signal);
    if (!res.ok) {
      return this.report(res.error);
    }
    const surface = this.renderer.render({
      text: res.value,
      title: 'Full Explanation',
      language: this.detectLanguage(document),
      format: 'prose',
      owner: document,
    });
    return { status: 'rendered', text: res.value, surface };
  }

  detectLanguage(document: EditorDocument): string {
    if (!this.config.auto_detect_language) {
      return this.config.language;
    }
    return document.languageId !== '' ? document.languageId : 'text';
  }

  private resolveSession(document: EditorDocument, signal?: AbortSignal): Promise<Result<string>> {
    this.watch(document);
    return this.sessions.resolve(document.id, document.name, document.getText(), signal);
  }

  private watch(document: EditorDocument): void {
    if (this.watched.has(document.id)) return;
    this.watched.add(document.id);
    const subscription = document.onDidClose(() => {
      subscription.dispose();
      this.watched.delete(document.id);
      const sessionId = this.sessions.get(document.id);
      this.sessions.forget(document.id);
      if (sessionId !== undefined) {
        this.history.drop(sessionId);
      }
    });
  }

  private show(
    command: CommandSpec,
    text: string,
    language: string,
    format: ResponseFormat,
    owner: EditorDocument,
  ): RunOutcome {
    const surface = this.renderer.render({ text, title: command.title, language, format, owner });
    return { status: 'rendered', text, surface };
  }

  private applyToDocument(
    document: EditorDocument,
    marks: SelectionMarks,
    text: string,
    mode: ApplyMode,
  ): RunOutcome {
    const edit = applyEdit(document, marks, text, mode);
    if (!edit.ok) {
      return this.report(edit.error);
    }
    this.host.notify('info', 'Method autocompleted');
    return { status: 'applied', text, edit: edit.value };
  }

  private report(error: AssistError): RunOutcome {
    this.host.notify(SEVERITY[error.kind], error.message);
    return { status: 'failed', error };
  }
}
