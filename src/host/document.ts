import { readFileSync, writeFileSync } from 'node:fs';
import { relative, resolve } from 'node:path';
import type { Disposable, EditorDocument } from '../editor/types.js';
import { languageFromPath } from './language.js';

export class MemoryDocument implements EditorDocument {
  private lines: string[];
  private readonly closeListeners = new Set<() => void>();
  private closed = false;

  constructor(
    readonly id: string,
    readonly name: string,
    text: string,
    readonly languageId = 'text',
  ) {
    this.lines = text.split(/\r?\n/);
  }

  get lineCount(): number {
    return this.lines.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  getText(): string {
    return this.lines.join('\n');
  }

  getLines(start: number, end: number): string[] {
    return this.lines.slice(Math.max(start, 1) - 1, Math.max(end, 0));
  }

  replaceLines(start: number, deleteCount: number, lines: string[]): void {
    this.lines.splice(start, deleteCount, ...lines);
    if (this.lines.length === 0) {
      this.lines.push('');
    }
  }

  onDidClose(listener: () => void): Disposable {
    this.closeListeners.add(listener);
    return { dispose: () => this.closeListeners.delete(listener) };
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const listener of [...this.closeListeners]) {
      listener();
    }
    this.closeListeners.clear();
  }
}

/** A document backed by a file on disk; edits stay in memory until `save`. */
export class FileDocument extends MemoryDocument {
  private readonly trailingNewline: boolean;

  constructor(
    readonly path: string,
    text: string,
    name: string,
    languageId: string,
  ) {
    const trailingNewline = text.endsWith('\n');
    super(path, name, trailingNewline ? text.replace(/\r?\n$/, '') : text, languageId);
    this.trailingNewline = trailingNewline;
  }

  static load(filePath: string, cwd = process.cwd()): FileDocument {
    const absPath = resolve(cwd, filePath);
    const text = readFileSync(absPath, 'utf-8');
    return new FileDocument(absPath, text, relative(cwd, absPath), languageFromPath(absPath));
  }

  save(): void {
    const text = this.getText();
    writeFileSync(this.path, this.trailingNewline ? `${text}\n` : text, 'utf-8');
  }
}
