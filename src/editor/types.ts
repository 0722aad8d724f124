export type SelectionMode = 'char' | 'line' | 'block';

/** 1-based line and column; the column is inclusive. */
export interface Position {
  line: number;
  col: number;
}

/** Selection marks as the host reports them. A missing or zero-line mark means nothing is selected. */
export interface SelectionMarks {
  start?: Position;
  end?: Position;
  mode: SelectionMode;
}

export interface Disposable {
  dispose(): void;
}

export interface EditorDocument {
  readonly id: string;
  readonly name: string;
  readonly languageId: string;
  readonly lineCount: number;
  getText(): string;
  /** Lines `start..end`, 1-based and inclusive. */
  getLines(start: number, end: number): string[];
  /** Splice semantics over 0-based line indexes. */
  replaceLines(start: number, deleteCount: number, lines: string[]): void;
  onDidClose(listener: () => void): Disposable;
}

export interface Viewport {
  columns: number;
  lines: number;
}

export interface SurfaceOptions {
  width: number;
  height: number;
  row: number;
  col: number;
  border: 'rounded' | 'single' | 'none';
  title: string;
  titlePos: 'left' | 'center' | 'right';
  language: string;
  wrap: boolean;
  linebreak: boolean;
  cursorline: boolean;
}

export type ScrollDirection = 'up' | 'down';

/** A floating, read-only region the host draws over the editor. */
export interface Surface {
  isValid(): boolean;
  setLines(lines: string[]): void;
  mapKey(key: string, handler: () => void): void;
  scrollHalfPage(direction: ScrollDirection): void;
  recenter(): void;
  close(): void;
}

export type NotifyLevel = 'info' | 'warn' | 'error';

export interface EditorHost {
  activeDocument(): EditorDocument | undefined;
  selection(): SelectionMarks;
  viewport(): Viewport;
  openSurface(options: SurfaceOptions): Surface;
  notify(level: NotifyLevel, message: string): void;
}
