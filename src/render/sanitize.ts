const FENCE = /^```/;
const OPENING_FENCE = /^```[\w#+.-]*\s*$/;
const CLOSING_FENCE = /^```\s*$/;

function cleanLine(line: string): string {
  return line
    .replace(/^\s*[-+*]\s+/, '')    // list markers
    .replace(/^#+\s*/, '')          // headings
    .replace(/\*\*/g, '')           // bold
    .replace(/\*/g, '')             // italic
    .replace(/_/g, '');
}

/**
 * Strip emphasis, list and heading markup from prose. Fence lines toggle a
 * code block; the fences and everything between them are kept verbatim.
 */
export function cleanProse(text: string): string {
  let inFence = false;
  const out: string[] = [];
  for (const line of text.split(/\r?\n/)) {
    if (FENCE.test(line)) {
      inFence = !inFence;
      out.push(line);
    } else {
      out.push(inFence ? line : cleanLine(line));
    }
  }
  return out.join('\n');
}

/**
 * Strip one wrapping code fence from LLM output.
 * Handles: ```python\n...\n``` , ```\n...\n``` , and text with only one of the two.
 */
export function stripFences(text: string): string {
  const lines = text.split(/\r?\n/);

  let first = 0;
  if (OPENING_FENCE.test(lines[0] ?? '')) {
    first = 1;
  }

  let last = lines.length - 1;
  while (last >= first && (lines[last] ?? '').trim() === '') {
    last--;
  }
  if (last >= first && CLOSING_FENCE.test(lines[last] ?? '')) {
    return lines.slice(first, last).join('\n');
  }
  return first === 0 ? text : lines.slice(first).join('\n');
}
