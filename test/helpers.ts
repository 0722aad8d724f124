import type { FetchLike } from '../src/agent/client.js';
import { DEFAULT_CONFIG, resolveConfig, type AssistConfig } from '../src/config.js';
import type {
  EditorDocument,
  EditorHost,
  NotifyLevel,
  ScrollDirection,
  SelectionMarks,
  Surface,
  SurfaceOptions,
  Viewport,
} from '../src/editor/types.js';
import { MemoryDocument } from '../src/host/document.js';
import { createStubApp } from '../src/server/index.js';

export class FakeSurface implements Surface {
  lines: string[] = [];
  readonly keys = new Map<string, () => void>();
  readonly scrolls: string[] = [];
  closed = false;

  constructor(readonly options: SurfaceOptions) {}

  isValid(): boolean {
    return !this.closed;
  }

  setLines(lines: string[]): void {
    this.lines = lines;
  }

  mapKey(key: string, handler: () => void): void {
    this.keys.set(key, handler);
  }

  press(key: string): void {
    const handler = this.keys.get(key);
    if (!handler) throw new Error(`no mapping for ${key}`);
    handler();
  }

  scrollHalfPage(direction: ScrollDirection): void {
    this.scrolls.push(direction);
  }

  recenter(): void {
    this.scrolls.push('recenter');
  }

  close(): void {
    if (this.closed) throw new Error('Invalid surface: already closed');
    this.closed = true;
  }
}

export class FakeHost implements EditorHost {
  readonly surfaces: FakeSurface[] = [];
  readonly notifications: Array<{ level: NotifyLevel; message: string }> = [];
  document: EditorDocument | undefined;
  marks: SelectionMarks;
  view: Viewport = { columns: 100, lines: 40 };

  constructor(document?: EditorDocument, marks: SelectionMarks = { mode: 'char' }) {
    this.document = document;
    this.marks = marks;
  }

  activeDocument(): EditorDocument | undefined {
    return this.document;
  }

  selection(): SelectionMarks {
    return this.marks;
  }

  viewport(): Viewport {
    return this.view;
  }

  openSurface(options: SurfaceOptions): FakeSurface {
    const surface = new FakeSurface(options);
    this.surfaces.push(surface);
    return surface;
  }

  notify(level: NotifyLevel, message: string): void {
    this.notifications.push({ level, message });
  }
}

/** Routes client requests into an in-process stub app and records each path. */
export function stubFetch(app = createStubApp()): { fetch: FetchLike; calls: string[] } {
  const calls: string[] = [];
  const fetch: FetchLike = async (input, init) => {
    calls.push(new URL(input).pathname);
    return app.fetch(new Request(input, init));
  };
  return { fetch, calls };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

export function testConfig(overrides: Partial<AssistConfig> = {}): AssistConfig {
  return { ...resolveConfig(), spinner_enabled: false, ...overrides, surface: { ...DEFAULT_CONFIG.surface, ...overrides.surface } };
}

export function sampleDocument(lines: string[], languageId = 'python', id = 'doc-1'): MemoryDocument {
  return new MemoryDocument(id, 'sample.py', lines.join('\n'), languageId);
}
