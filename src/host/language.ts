import { extname } from 'node:path';

const BY_EXTENSION: Record<string, string> = {
  '.c': 'c',
  '.h': 'c',
  '.cc': 'cpp',
  '.cpp': 'cpp',
  '.hpp': 'cpp',
  '.cs': 'cs',
  '.go': 'go',
  '.java': 'java',
  '.js': 'javascript',
  '.mjs': 'javascript',
  '.cjs': 'javascript',
  '.jsx': 'javascriptreact',
  '.ts': 'typescript',
  '.mts': 'typescript',
  '.tsx': 'typescriptreact',
  '.kt': 'kotlin',
  '.lua': 'lua',
  '.md': 'markdown',
  '.php': 'php',
  '.py': 'python',
  '.rb': 'ruby',
  '.rs': 'rust',
  '.sh': 'sh',
  '.sql': 'sql',
  '.swift': 'swift',
};

/** Language id for a file name, `text` when the extension is unknown. */
export function languageFromPath(filePath: string): string {
  return BY_EXTENSION[extname(filePath).toLowerCase()] ?? 'text';
}
