import type { Operation } from './agent/index.js';
import type { ResponseFormat } from './render/surface.js';

export type CommandId = 'explain' | 'fix' | 'complete' | 'autofill' | 'summarize';

export type CommandOutput = { kind: 'surface'; format: ResponseFormat } | { kind: 'apply' };

export interface CommandSpec {
  id: CommandId;
  title: string;
  description: string;
  /** Default binding in visual mode. */
  key: string;
  operation: Operation;
  needsSelection: boolean;
  output: CommandOutput;
}

export const COMMANDS: readonly CommandSpec[] = [
  {
    id: 'explain',
    title: 'Explain',
    description: 'Explain the selected code in the context of the whole file',
    key: '<leader>me',
    operation: 'explain',
    needsSelection: true,
    output: { kind: 'surface', format: 'prose' },
  },
  {
    id: 'fix',
    title: 'Fix',
    description: 'Show a corrected version of the selected code',
    key: '<leader>mf',
    operation: 'fix',
    needsSelection: true,
    output: { kind: 'surface', format: 'code' },
  },
  {
    id: 'complete',
    title: 'Method Completion',
    description: 'Preview a completion of the selected method',
    key: '<leader>mc',
    operation: 'complete',
    needsSelection: true,
    output: { kind: 'surface', format: 'code' },
  },
  {
    id: 'autofill',
    title: 'Method Autofill',
    description: 'Complete the selected method and write it into the document',
    key: '<leader>mca',
    operation: 'complete',
    needsSelection: true,
    output: { kind: 'apply' },
  },
  {
    id: 'summarize',
    title: 'Summary',
    description: 'Summarize the whole document',
    key: '<leader>ms',
    operation: 'summary',
    needsSelection: false,
    output: { kind: 'surface', format: 'prose' },
  },
];

export function findCommand(id: string): CommandSpec | undefined {
  return COMMANDS.find((cmd) => cmd.id === id);
}

export function getCommand(id: CommandId): CommandSpec {
  const cmd = findCommand(id);
  if (!cmd) {
    throw new Error(`Unknown command: ${id}`);
  }
  return cmd;
}

/** Default bindings with the config's `[keys]` table laid over them. */
export function keyBindings(overrides: Record<string, string> = {}): Array<{ id: CommandId; key: string }> {
  return COMMANDS.map((cmd) => ({ id: cmd.id, key: overrides[cmd.id] ?? cmd.key }));
}
