/**
 * Render Command
 *
 * Print the ffmpeg command a job compiles to.
 */

import { errorMessage, printError, printJson } from '../lib/output.js';
import { prepareJob } from '../lib/prepare.js';

interface RenderOptions {
  probe?: boolean;
  json?: boolean;
}

export async function renderCommand(path: string, options: RenderOptions): Promise<void> {
  try {
    const { ffmpeg } = await prepareJob(path, { probe: options.probe });

    if (options.json) {
      printJson(ffmpeg.render());
      return;
    }
    console.log(ffmpeg.getCommand());
  } catch (error) {
    printError(errorMessage(error));
    process.exit(1);
  }
}
