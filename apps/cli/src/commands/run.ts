/**
 * Run Command
 *
 * Compile a job and execute ffmpeg.
 */

import ora from 'ora';
import { formatDuration, formatSeconds } from '@reelgraph/utils';
import { errorMessage, printError, printInfo, printSuccess } from '../lib/output.js';
import { prepareJob } from '../lib/prepare.js';

interface RunOptions {
  probe?: boolean;
  overwrite?: boolean;
}

export async function runCommand(path: string, options: RunOptions): Promise<void> {
  const spinner = ora('Preparing job...').start();

  try {
    const { ffmpeg } = await prepareJob(path, {
      probe: options.probe,
      overwrite: options.overwrite,
    });

    spinner.stop();
    printInfo(ffmpeg.getCommand());
    spinner.start('Running ffmpeg...');
    const result = await ffmpeg.run({
      onProgress: progress => {
        spinner.text =
          progress.percent === null
            ? `Running ffmpeg... ${formatSeconds(progress.time)}s`
            : `Running ffmpeg... ${progress.percent.toFixed(1)}% (${progress.speed}x)`;
      },
    });
    spinner.stop();

    printSuccess(`Finished in ${formatDuration(result.duration)}`);
  } catch (error) {
    spinner.fail('Job failed');
    printError(errorMessage(error));
    process.exit(1);
  }
}
