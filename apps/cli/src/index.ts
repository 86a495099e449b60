#!/usr/bin/env tsx
/**
 * CLI Entry Point
 *
 * Compiles JSON job files into ffmpeg commands, checks them for buffering
 * hazards and runs them.
 */

import './config/env.js';
import { Command } from 'commander';
import chalk from 'chalk';

// Commands
import { renderCommand } from './commands/render.js';
import { checkCommand } from './commands/check.js';
import { runCommand } from './commands/run.js';
import { probeCommand } from './commands/probe.js';

const program = new Command();

program
  .name('reelgraph')
  .description('Compile media processing graphs to ffmpeg commands')
  .version('0.1.0');

// ============================================
// JOB COMMANDS
// ============================================

program
  .command('render <job>')
  .description('Print the ffmpeg command for a job file')
  .option('--no-probe', 'Do not probe input files for stream metadata')
  .option('--json', 'Print the argument list as JSON')
  .action(renderCommand);

program
  .command('check <job>')
  .description('Validate a job and report buffering hazards')
  .option('--no-probe', 'Do not probe input files for stream metadata')
  .option('--strict', 'Fail when stream metadata is unknown')
  .option('-t, --tolerance <seconds>', 'Ignore lags up to this many seconds')
  .action(checkCommand);

program
  .command('run <job>')
  .description('Run ffmpeg for a job file')
  .option('--no-probe', 'Do not probe input files for stream metadata')
  .option('--no-overwrite', 'Keep existing output files')
  .action(runCommand);

// ============================================
// MEDIA COMMANDS
// ============================================

program
  .command('probe <file>')
  .description('Show stream metadata of a media file')
  .option('--json', 'Output in JSON format')
  .action(probeCommand);

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
    process.exit(0);
  }
  if (err.code === 'commander.unknownCommand') {
    console.error(chalk.red('Unknown command:'), err.message);
    console.log('Run', chalk.cyan('reelgraph --help'), 'for available commands');
  }
  process.exit(1);
});

// Parse and execute
await program.parseAsync();
