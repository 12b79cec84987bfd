// packages/cli/src/commands/reap.ts — One reaper sweep

import chalk from 'chalk';

import { exitWithError, withService, type GlobalOptions } from '../utils.js';

export async function reapCommand(options: GlobalOptions): Promise<void> {
  try {
    const result = await withService(options, async (service) => service.reap());
    console.error(
      chalk.green(`Removed ${result.deletedJobs} job(s) and ${result.removedBuffers} log buffer(s)`),
    );
    console.log(JSON.stringify(result));
  } catch (error) {
    exitWithError(error);
  }
}
