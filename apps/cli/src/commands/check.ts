/**
 * Check Command
 *
 * Validate a job and report buffering hazards.
 */

import chalk from 'chalk';
import ora from 'ora';
import { formatSeconds } from '@reelgraph/utils';
import {
  errorMessage,
  printError,
  printHeader,
  printKeyValue,
  printSuccess,
  printWarning,
} from '../lib/output.js';
import { prepareJob } from '../lib/prepare.js';

interface CheckOptions {
  probe?: boolean;
  strict?: boolean;
  tolerance?: string;
}

function parseTolerance(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const tolerance = Number(value);
  if (!Number.isFinite(tolerance) || tolerance < 0) {
    throw new Error(`Invalid tolerance: ${value}`);
  }
  return tolerance;
}

export async function checkCommand(path: string, options: CheckOptions): Promise<void> {
  const spinner = ora('Checking job...').start();

  try {
    const { ffmpeg } = await prepareJob(path, { probe: options.probe });
    ffmpeg.render();
    const report = ffmpeg.checkBuffering({
      requireMetadata: options.strict,
      tolerance: parseTolerance(options.tolerance),
    });
    spinner.stop();

    printSuccess('Filter graph is valid');

    if (report.skipped.length > 0) {
      printWarning(
        `${report.skipped.length} codec(s) skipped: stream metadata is unknown`
      );
    }

    if (report.hazards.size === 0) {
      printSuccess('No buffering hazards');
      return;
    }

    printHeader('Buffering Hazards');
    for (const [stream, hazards] of report.hazards) {
      console.log(chalk.bold(stream));
      for (const hazard of hazards) {
        printKeyValue('Held by', String(hazard.held.codec));
        printKeyValue('Read ahead by', String(hazard.ahead.codec));
        printKeyValue('Lag', `${formatSeconds(hazard.lag)}s`);
      }
      console.log();
    }
    process.exit(2);
  } catch (error) {
    spinner.fail('Check failed');
    printError(errorMessage(error));
    process.exit(1);
  }
}
