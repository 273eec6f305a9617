#!/usr/bin/env node

import { Command } from 'commander';
import { registerCaptureCommand } from './commands/capture.js';
import { registerInstallBrowsersCommand } from './commands/install-browsers.js';

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('issue-capture')
    .description('Capture a paginated newspaper viewer into one PDF')
    .version('0.1.0');

  registerCaptureCommand(program);
  registerInstallBrowsersCommand(program);

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  const program = buildProgram();
  await program.parseAsync(argv);
}

if (process.env.NODE_ENV !== 'test') {
  runCli().catch((error: unknown) => {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
