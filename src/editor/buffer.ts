import { fail, ok, type Result } from '../errors.js';
import { stripFences } from '../render/sanitize.js';
import { normalizeMarks } from './selection.js';
import type { EditorDocument, SelectionMarks } from './types.js';

export type ApplyMode = 'replace' | 'insertAfter';

/** Where the generated text landed, in 1-based lines of the updated document. */
export interface AppliedEdit {
  startLine: number;
  endLine: number;
  /** Change in the document's line count; lines below the edit shift by this much. */
  lineDelta: number;
}

export function applyEdit(
  document: EditorDocument,
  marks: SelectionMarks,
  generatedText: string,
  mode: ApplyMode,
): Result<AppliedEdit> {
  const range = normalizeMarks(marks);
  if (!range) {
    return fail('EmptySelection', 'No lines selected to apply the edit to');
  }

  const lineCount = document.lineCount;
  const startLine = Math.min(range.start.line, lineCount);
  const endLine = Math.min(range.end.line, lineCount);
  const newLines = stripFences(generatedText).split('\n');

  if (mode === 'replace') {
    const originalLineCount = endLine - startLine + 1;
    document.replaceLines(startLine - 1, originalLineCount, newLines);
    return ok({
      startLine,
      endLine: startLine + newLines.length - 1,
      lineDelta: newLines.length - originalLineCount,
    });
  }

  document.replaceLines(endLine, 0, newLines);
  return ok({
    startLine: endLine + 1,
    endLine: endLine + newLines.length,
    lineDelta: newLines.length,
  });
}
