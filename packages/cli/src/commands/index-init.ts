// packages/cli/src/commands/index-init.ts — Create the publications index when it is missing

import chalk from 'chalk';

import { exitWithError, withService, type GlobalOptions } from '../utils.js';

export async function indexInitCommand(options: GlobalOptions): Promise<void> {
  try {
    const created = await withService(options, (service) => service.ensureIndex());
    if (created) {
      console.log(chalk.green('Index created'));
    } else {
      console.log(chalk.gray('Index already exists'));
    }
  } catch (error) {
    exitWithError(error);
  }
}
