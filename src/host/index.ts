import { emitKeypressEvents, type Key } from 'node:readline';
import type {
  EditorDocument,
  EditorHost,
  NotifyLevel,
  SelectionMarks,
  SelectionMode,
  SurfaceOptions,
  Viewport,
} from '../editor/types.js';
import { TerminalSurface, type TerminalOutput } from './terminal.js';

/** Column used for "to the end of the line" when a range gives no end column. */
export const END_OF_LINE = Number.MAX_SAFE_INTEGER;

const RANGE_PATTERN = /^(\d+)(?:\.(\d+))?(?::(\d+)(?:\.(\d+))?)?$/;

/**
 * Parse `L[.C][:L[.C]]` into selection marks, e.g. `5:7`, `5.3:7.10` or `12`.
 * Returns null when the text is not a range.
 */
export function parseRange(text: string, mode: SelectionMode = 'char'): SelectionMarks | null {
  const match = RANGE_PATTERN.exec(text.trim());
  if (!match) return null;
  const [, startLine, startCol, endLine, endCol] = match;
  const start = { line: Number(startLine), col: startCol ? Number(startCol) : 1 };
  const end = {
    line: endLine ? Number(endLine) : start.line,
    col: endCol ? Number(endCol) : END_OF_LINE,
  };
  if (start.line < 1 || end.line < 1) return null;
  return { start, end, mode };
}

const LABELS: Record<NotifyLevel, string> = {
  info: 'info:',
  warn: 'warning:',
  error: 'error:',
};

export interface TerminalHostOptions {
  document: EditorDocument;
  selection: SelectionMarks;
  output?: TerminalOutput;
}

/** Host that edits a single document and draws surfaces on the terminal. */
export class TerminalHost implements EditorHost {
  readonly surfaces: TerminalSurface[] = [];
  private readonly document: EditorDocument;
  private readonly marks: SelectionMarks;
  private readonly output: TerminalOutput;

  constructor(opts: TerminalHostOptions) {
    this.document = opts.document;
    this.marks = opts.selection;
    this.output = opts.output ?? process.stdout;
  }

  activeDocument(): EditorDocument {
    return this.document;
  }

  selection(): SelectionMarks {
    return this.marks;
  }

  viewport(): Viewport {
    return { columns: this.output.columns ?? 80, lines: this.output.rows ?? 24 };
  }

  openSurface(options: SurfaceOptions): TerminalSurface {
    const surface = new TerminalSurface(options, this.output);
    this.surfaces.push(surface);
    return surface;
  }

  notify(level: NotifyLevel, message: string): void {
    const line = `[snippet-assist] ${LABELS[level]} ${message}`;
    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  /**
   * Feed keypresses to the open surfaces until every one is closed. Without a
   * TTY to read from, the surfaces stay printed and are closed straight away.
   */
  waitForDismissal(input: NodeJS.ReadStream = process.stdin): Promise<void> {
    const open = () => this.surfaces.filter((s) => s.isValid());
    if (open().length === 0) {
      return Promise.resolve();
    }
    if (!input.isTTY || !this.output.isTTY) {
      for (const surface of open()) surface.close();
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      emitKeypressEvents(input);
      input.setRawMode(true);
      input.resume();

      const onKeypress = (str: string | undefined, key: Key | undefined) => {
        if (key?.ctrl && key.name === 'c') {
          for (const surface of open()) surface.close();
        } else {
          const name = keyName(str, key);
          const top = open().at(-1);
          if (name && top) top.handleKey(name);
        }
        if (open().length === 0) {
          input.off('keypress', onKeypress);
          input.setRawMode(false);
          input.pause();
          resolve();
        }
      };
      input.on('keypress', onKeypress);
    });
  }
}

/** Key notation for a keypress: `q`, `<Esc>`, `<C-d>`, ... */
export function keyName(str: string | undefined, key: Key | undefined): string | undefined {
  if (key?.name === 'escape') return '<Esc>';
  if (key?.name === 'return') return '<CR>';
  if (key?.ctrl && key.name) return `<C-${key.name}>`;
  return str;
}
