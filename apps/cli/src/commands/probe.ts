/**
 * Probe Command
 *
 * Show the stream metadata a file would enter the graph with.
 */

import chalk from 'chalk';
import ora from 'ora';
import { FFProbe, metadataFromProbe } from '@reelgraph/media';
import { formatSeconds } from '@reelgraph/utils';
import { getConfig } from '../config/index.js';
import { errorMessage, printError, printHeader, printJson, printKeyValue } from '../lib/output.js';

interface ProbeOptions {
  json?: boolean;
}

export async function probeCommand(path: string, options: ProbeOptions): Promise<void> {
  const spinner = ora('Probing media file...').start();

  try {
    const result = await new FFProbe(getConfig().ffprobePath).probe(path);
    const streams = metadataFromProbe(result);
    spinner.stop();

    if (options.json) {
      printJson(streams);
      return;
    }

    printHeader('Streams');
    printKeyValue('File', path);
    console.log();

    streams.forEach(({ kind, meta }, i) => {
      if (!meta) {
        return;
      }
      const timing = `${formatSeconds(meta.start)}s +${formatSeconds(meta.duration)}s`;
      if (meta.kind === 'video') {
        console.log(
          `  ${chalk.cyan(`#${i}`)} ${kind} ${meta.width}x${meta.height} ` +
            `@ ${meta.frameRate.toFixed(2)} fps, ${timing}` +
            (meta.pixelFormat ? ` (${meta.pixelFormat})` : '')
        );
      } else {
        console.log(
          `  ${chalk.cyan(`#${i}`)} ${kind} ${meta.channels}ch @ ${meta.sampleRate} Hz, ${timing}`
        );
      }
    });
  } catch (error) {
    spinner.fail('Probe failed');
    printError(errorMessage(error));
    process.exit(1);
  }
}
