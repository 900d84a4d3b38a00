#!/usr/bin/env node
import { Command } from 'commander';
import { createRequire } from 'node:module';
import { registerServeCommand } from './commands/serve.js';
import { registerGenerateCommand } from './commands/generate.js';

const require = createRequire(import.meta.url);

const pkg = require('../../package.json') as { version: string; description: string };

async function main(): Promise<void> {
  const program = new Command();

  program
    .name('textgen-bridge')
    .description(pkg.description)
    .version(pkg.version);

  registerServeCommand(program);
  registerGenerateCommand(program);

  await program.parseAsync(process.argv);
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`[textgen-bridge] Error: ${message}\n`);
  process.exit(1);
});
