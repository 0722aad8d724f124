import type { EditorDocument, Position, SelectionMarks } from './types.js';

export interface NormalizedRange {
  start: Position;
  end: Position;
}

function isSet(pos: Position | undefined): pos is Position {
  return pos !== undefined && pos.line > 0;
}

/**
 * Put the marks in document order. Returns null when either mark is missing,
 * which every caller treats as an empty selection.
 */
export function normalizeMarks(marks: SelectionMarks): NormalizedRange | null {
  const { start, end } = marks;
  if (!isSet(start) || !isSet(end)) {
    return null;
  }
  const reversed = start.line > end.line || (start.line === end.line && start.col > end.col);
  return reversed ? { start: end, end: start } : { start, end };
}

/** Columns are 1-based and inclusive; a zero column reads as the start of the line. */
function sliceColumns(line: string, startCol: number, endCol: number): string {
  return line.slice(Math.max(startCol, 1) - 1, Math.max(endCol, 0));
}

/**
 * Text covered by the marks. Block selections go through the character
 * algorithm, so the cut is not rectangular.
 */
export function extractSelection(
  marks: SelectionMarks,
  getLines: (start: number, end: number) => string[],
): string {
  const range = normalizeMarks(marks);
  if (!range) {
    return '';
  }
  const { start, end } = range;
  const lines = getLines(start.line, end.line);
  if (lines.length === 0) {
    return '';
  }

  if (marks.mode === 'line') {
    return lines.join('\n');
  }

  // A range that runs past the last line keeps that line whole.
  const endCol = lines.length < end.line - start.line + 1 ? Number.MAX_SAFE_INTEGER : end.col;

  if (lines.length === 1) {
    return sliceColumns(lines[0] ?? '', start.col, endCol);
  }

  const last = lines.length - 1;
  lines[last] = sliceColumns(lines[last] ?? '', 1, endCol);
  lines[0] = (lines[0] ?? '').slice(Math.max(start.col, 1) - 1);
  return lines.join('\n');
}

export function getSelectedText(marks: SelectionMarks, document: EditorDocument): string {
  return extractSelection(marks, (start, end) => document.getLines(start, end));
}
