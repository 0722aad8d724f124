#!/usr/bin/env node
import { Command, Option } from 'commander';
import { COMMANDS, keyBindings, type CommandId } from './commands.js';
import { DEFAULT_CONFIG, loadConfig, type AssistConfig } from './config.js';
import type { SelectionMarks, SelectionMode } from './editor/types.js';

interface CommandOptions {
  range?: string;
  mode: SelectionMode;
  config: string;
  lang?: string;
  baseUrl?: string;
  question?: string;
  insertAfter?: boolean;
}

function effectiveConfig(opts: CommandOptions): AssistConfig {
  const config = loadConfig(opts.config) ?? structuredClone(DEFAULT_CONFIG);
  if (opts.baseUrl) config.base_url = opts.baseUrl.replace(/\/+$/, '');
  if (opts.lang) {
    config.auto_detect_language = false;
    config.language = opts.lang;
  }
  return config;
}

async function runCommand(id: CommandId, file: string, opts: CommandOptions): Promise<void> {
  const { FileDocument } = await import('./host/document.js');
  const { TerminalHost, parseRange } = await import('./host/index.js');
  const { Assistant } = await import('./assistant.js');

  let selection: SelectionMarks = { mode: opts.mode };
  if (opts.range) {
    const parsed = parseRange(opts.range, opts.mode);
    if (!parsed) {
      console.error(`Error: Invalid range "${opts.range}" (expected L[.C]:L[.C], e.g. 5:7)`);
      process.exitCode = 1;
      return;
    }
    selection = parsed;
  }

  let document: InstanceType<typeof FileDocument>;
  try {
    document = FileDocument.load(file);
  } catch (err) {
    console.error(`Error: Cannot read ${file}: ${err instanceof Error ? err.message : err}`);
    process.exitCode = 1;
    return;
  }

  const host = new TerminalHost({ document, selection });
  const assistant = new Assistant({ host, config: effectiveConfig(opts) });
  const outcome = await assistant.run(id, {
    question: opts.question,
    applyMode: opts.insertAfter ? 'insertAfter' : 'replace',
  });

  if (outcome.status === 'failed') {
    process.exitCode = 1;
    return;
  }
  if (outcome.status === 'applied') {
    document.save();
    return;
  }
  await host.waitForDismissal();
}

const program = new Command();

program
  .name('snippet-assist')
  .description('Explain, fix and complete selected code with a remote AI assistant')
  .version('0.1.0');

for (const spec of COMMANDS) {
  const cmd = program
    .command(spec.id)
    .description(spec.description)
    .argument('<file>', 'File to work on')
    .option('-c, --config <path>', 'Path to snippet-assist.toml config file', 'snippet-assist.toml')
    .option('-l, --lang <id>', 'Source language to send instead of the detected one')
    .option('--base-url <url>', 'Assistant server root URL');

  if (spec.needsSelection) {
    cmd
      .option('-r, --range <range>', 'Selected lines, L[.C]:L[.C] (e.g. 5:7 or 5.3:7.10)')
      .addOption(new Option('-m, --mode <mode>', 'Selection mode').choices(['char', 'line', 'block']).default('char'));
  } else {
    cmd.addOption(new Option('-m, --mode <mode>').default('char').hideHelp());
  }
  if (spec.id === 'explain') {
    cmd.option('-q, --question <text>', 'Question to ask about the selection');
  }
  if (spec.id === 'autofill') {
    cmd.option('--insert-after', 'Insert the completion after the selection instead of replacing it');
  }

  cmd.action(async (file: string, opts: CommandOptions) => {
    await runCommand(spec.id, file, opts);
  });
}

program
  .command('keys')
  .description('List commands with their key bindings')
  .option('-c, --config <path>', 'Path to snippet-assist.toml config file', 'snippet-assist.toml')
  .action((opts: { config: string }) => {
    const config = loadConfig(opts.config) ?? DEFAULT_CONFIG;
    for (const { id, key } of keyBindings(config.keys)) {
      console.log(`${key.padEnd(14)} ${id}`);
    }
  });

program
  .command('stub-server')
  .description('Serve an echoing stand-in for the assistant server')
  .option('-p, --port <port>', 'Port number', '8000')
  .option('--host <host>', 'Host to bind', '127.0.0.1')
  .action(async (opts: { port: string; host: string }) => {
    const { startStubServer } = await import('./server/serve.js');
    startStubServer({ port: Number(opts.port), host: opts.host });
  });

await program.parseAsync();
