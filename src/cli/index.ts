#!/usr/bin/env node

/**
 * tracehound CLI: offline threat hunting over web access logs.
 *
 * Usage:
 *   tracehound analyze --input ./logs/ --out report.md
 *   tracehound analyze --input access.log.gz --json report.json --html report.html
 *   tracehound analyze --input ./logs/ --format all --out out/hunt
 */

import 'dotenv/config';

import { Command, CommanderError } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import chalk from 'chalk';

import { registerAnalyzeCommand } from './commands/analyze.js';
import { errorMessage } from '../utils/errors.js';

const here = dirname(fileURLToPath(import.meta.url));
const pkg: unknown = JSON.parse(readFileSync(resolve(here, '../../package.json'), 'utf-8'));
const version =
  typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
    ? pkg.version
    : '0.0.0';

const program = new Command();

program
  .name('tracehound')
  .description('Offline threat hunting over web-server access logs')
  .version(version);

// Global error handling; set before subcommands so they inherit it
program.exitOverride();

registerAnalyzeCommand(program);

async function main(): Promise<void> {
  try {
    await program.parseAsync();
  } catch (err) {
    if (err instanceof CommanderError) {
      // Help and version output are not failures
      if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
        return;
      }
      // Commander has already printed usage errors
      process.exit(err.exitCode);
    }

    console.error('');
    console.error(chalk.red(`Error: ${errorMessage(err)}`));
    console.error('');
    console.error(chalk.gray('Run "tracehound --help" for usage information.'));
    console.error('');
    process.exit(1);
  }
}

await main();
