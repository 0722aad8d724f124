import type { ScrollDirection, Surface, SurfaceOptions } from '../editor/types.js';

export interface TerminalOutput {
  write(chunk: string): unknown;
  isTTY?: boolean;
  columns?: number;
  rows?: number;
}

const BORDERS = {
  rounded: { tl: '╭', tr: '╮', bl: '╰', br: '╯', h: '─', v: '│' },
  single: { tl: '┌', tr: '┐', bl: '└', br: '┘', h: '─', v: '│' },
} as const;

const INVERSE = '\x1b[7m';
const RESET = '\x1b[0m';

/**
 * Split one line into rows of at most `width` characters. With `linebreak`
 * the break goes after the last space that fits, as long as there is one.
 */
export function wrapLine(line: string, width: number, linebreak: boolean): string[] {
  if (width <= 0) return [line];
  const rows: string[] = [];
  let rest = line;
  while (rest.length > width) {
    let cut = width;
    if (linebreak) {
      const space = rest.lastIndexOf(' ', width - 1);
      if (space > 0) cut = space + 1;
    }
    rows.push(rest.slice(0, cut));
    rest = rest.slice(cut);
  }
  rows.push(rest);
  return rows;
}

function titledEdge(width: number, title: string, pos: SurfaceOptions['titlePos'], h: string): string {
  const label = title.slice(0, width);
  const free = width - label.length;
  const left = pos === 'left' ? 0 : pos === 'right' ? free : Math.floor(free / 2);
  return h.repeat(left) + label + h.repeat(free - left);
}

/** Floating box drawn straight onto a terminal stream. */
export class TerminalSurface implements Surface {
  private lines: string[] = [];
  private rows: string[] = [];
  private top = 0;
  private cursor = 0;
  private valid = true;
  private readonly keys = new Map<string, () => void>();
  private readonly closeListeners: Array<() => void> = [];

  constructor(
    readonly options: SurfaceOptions,
    private readonly out: TerminalOutput,
  ) {}

  get topRow(): number {
    return this.top;
  }

  get cursorRow(): number {
    return this.cursor;
  }

  get content(): readonly string[] {
    return this.lines;
  }

  isValid(): boolean {
    return this.valid;
  }

  setLines(lines: string[]): void {
    this.assertValid();
    this.lines = [...lines];
    this.rows = this.options.wrap
      ? this.lines.flatMap((line) => wrapLine(line, this.options.width, this.options.linebreak))
      : [...this.lines];
    this.top = 0;
    this.cursor = 0;
    this.draw();
  }

  mapKey(key: string, handler: () => void): void {
    this.keys.set(key, handler);
  }

  /** Run the handler bound to `key`. Returns false when nothing is bound. */
  handleKey(key: string): boolean {
    const handler = this.keys.get(key);
    if (!handler || !this.valid) return false;
    handler();
    return true;
  }

  scrollHalfPage(direction: ScrollDirection): void {
    const half = Math.max(1, Math.floor(this.options.height / 2));
    const step = direction === 'down' ? half : -half;
    this.cursor = clamp(this.cursor + step, 0, Math.max(0, this.rows.length - 1));
    this.top = clamp(this.top + step, 0, this.maxTop());
    this.draw();
  }

  recenter(): void {
    this.top = clamp(this.cursor - Math.floor(this.options.height / 2), 0, this.maxTop());
    this.draw();
  }

  onDidClose(listener: () => void): void {
    this.closeListeners.push(listener);
  }

  close(): void {
    this.assertValid();
    this.valid = false;
    if (this.out.isTTY) {
      this.clear();
    }
    for (const listener of this.closeListeners) {
      listener();
    }
  }

  /** The box as it would be drawn now, one string per terminal row, without colors. */
  frame(): string[] {
    return this.box(this.top, this.options.height);
  }

  private box(from: number, count: number): string[] {
    const { width, border, title, titlePos } = this.options;
    const body: string[] = [];
    for (let i = 0; i < count; i++) {
      body.push((this.rows[from + i] ?? '').slice(0, width).padEnd(width));
    }
    if (border === 'none') {
      return body;
    }
    const b = BORDERS[border];
    return [
      b.tl + titledEdge(width, title, titlePos, b.h) + b.tr,
      ...body.map((row) => b.v + row + b.v),
      b.bl + b.h.repeat(width) + b.br,
    ];
  }

  private draw(): void {
    if (!this.valid) return;
    if (!this.out.isTTY) {
      // Streams cannot scroll; write every row.
      const indent = ' '.repeat(this.options.col);
      const rows = this.box(0, Math.max(this.options.height, this.rows.length));
      this.out.write(rows.map((row) => indent + row).join('\n') + '\n');
      return;
    }
    const frame = this.frame();
    const edge = this.options.border === 'none' ? 0 : 1;
    const cursorFrameRow = this.cursor - this.top + edge;
    let chunk = '';
    frame.forEach((row, i) => {
      const highlighted = this.options.cursorline && i === cursorFrameRow;
      const inner = row.slice(edge, row.length - edge);
      chunk += `\x1b[${this.options.row + i + 1};${this.options.col + 1}H`;
      chunk += highlighted ? row.slice(0, edge) + INVERSE + inner + RESET + row.slice(row.length - edge) : row;
    });
    this.out.write(chunk);
  }

  private clear(): void {
    const frame = this.frame();
    const blank = ' '.repeat(frame[0]?.length ?? 0);
    let chunk = '';
    for (let i = 0; i < frame.length; i++) {
      chunk += `\x1b[${this.options.row + i + 1};${this.options.col + 1}H${blank}`;
    }
    this.out.write(chunk);
  }

  private maxTop(): number {
    return Math.max(0, this.rows.length - this.options.height);
  }

  private assertValid(): void {
    if (!this.valid) {
      throw new Error('Invalid surface: already closed');
    }
  }
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}
