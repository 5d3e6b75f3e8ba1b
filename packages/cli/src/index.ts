#!/usr/bin/env node

import 'reflect-metadata';
import { Command } from 'commander';
import * as dotenv from 'dotenv';
import { ALL_STAGES } from '@issuevault/core';
import type { Stage } from '@issuevault/core';
import { runLogin, runStages } from './commands';
import type { CommandOptions } from './commands';

dotenv.config();

const program = new Command();

program
  .name('issuevault')
  .description('Export GitHub issues and pull requests to Markdown with local attachments')
  .version('0.1.0');

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function withCommonOptions(command: Command): Command {
  return command
    .option('-r, --repo <owner/repo>', 'Repository to process (repeatable; default: EXPORT_REPOS)', collect, [])
    .option('--raw-root <dir>', 'Raw capture root (default: export/raw)')
    .option('--out-root <dir>', 'Output root (default: export)')
    .option('--profile-dir <dir>', 'Browser profile directory (default: export/browser_profile)')
    .option('-v, --verbose', 'Debug logging');
}

function withFetchOptions(command: Command): Command {
  return command
    .option('-c, --concurrency <n>', 'Parallel direct downloads (default: 4)')
    .option('--max-attempts <n>', 'Attempts per attachment (default: 3)')
    .option('--timeout <ms>', 'Request timeout in milliseconds (default: 30000)')
    .option('--headed', 'Show the browser used for session-gated attachments')
    .option('--browser-channel <name>', 'Installed browser to drive, e.g. chrome');
}

function stageCommand(name: string, description: string, stages: readonly Stage[], fetches: boolean): void {
  let command = withCommonOptions(program.command(name).description(description))
    .option('--commit', 'Commit the output root with git afterwards');
  if (fetches) {
    command = withFetchOptions(command);
  }
  command.action(async (options: CommandOptions) => {
    process.exitCode = await runStages(stages, options);
  });
}

stageCommand('export', 'Render Markdown documents and the asset manifest', ['export'], false);
stageCommand('fetch', 'Download the attachments listed in the asset manifest', ['fetch'], true);
stageCommand('normalize', 'Fix attachment extensions from their content and relink documents', ['normalize'], false);
stageCommand('run', 'Export, fetch and normalize in one go', ALL_STAGES, true);

program
  .command('login')
  .description('Log in once in a visible browser; later runs reuse the saved session')
  .option('--profile-dir <dir>', 'Browser profile directory (default: export/browser_profile)')
  .option('--browser-channel <name>', 'Installed browser to drive, e.g. chrome')
  .option('-v, --verbose', 'Debug logging')
  .action(async (options: CommandOptions) => {
    process.exitCode = await runLogin(options);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
