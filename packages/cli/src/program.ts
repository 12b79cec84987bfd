// packages/cli/src/program.ts — Command tree for the pubsync CLI

import { JOB_STATUSES, JOB_TYPES, VERSION } from '@pubsync/core';
import { Command, Option } from 'commander';

import { indexInitCommand } from './commands/index-init.js';
import {
  jobsListCommand,
  jobsStartCommand,
  jobsStatusCommand,
  jobsStopCommand,
  type ListOptions,
  type StartOptions,
} from './commands/jobs.js';
import { reapCommand } from './commands/reap.js';
import { searchCommand, type SearchOptions } from './commands/search.js';
import { parseIdList, parseInteger, type GlobalOptions } from './utils.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('pubsync')
    .description('Keep the publications search index in sync with the tender database')
    .version(VERSION)
    .option('--verbose', 'Enable debug logging')
    .option('--project-dir <dir>', 'Directory holding .pubsync.yml');

  // ── Jobs ──

  const jobs = program.command('jobs').description('Indexing jobs: start, inspect, stop');

  jobs
    .command('start')
    .description('Run an indexing job in this process until it finishes')
    .addArgument(jobs.createArgument('<type>', 'Job type').choices(JOB_TYPES))
    .option('--id <n>', 'Publication id (index-publication)', parseInteger)
    .option('--scraper-id <n>', 'Scraper id (index-scraper)', parseInteger)
    .option('--since <datetime>', 'YYYY-MM-DD or YYYY-MM-DD HH:MM:SS (index-scraper, sync-since)')
    .option('--owner <id>', 'Owner recorded on the job')
    .action((type: string, _options: unknown, command: Command) =>
      jobsStartCommand(type, command.optsWithGlobals<StartOptions>()),
    );

  jobs
    .command('list')
    .description('List jobs, newest first')
    .addOption(new Option('--status <status>', 'Filter by status').choices(JOB_STATUSES))
    .addOption(new Option('--type <type>', 'Filter by type').choices(JOB_TYPES))
    .option('--owner <id>', 'Filter by owner')
    .option('--limit <n>', 'Max results', parseInteger, 20)
    .option('--offset <n>', 'Skip this many results', parseInteger, 0)
    .action((_options: unknown, command: Command) => jobsListCommand(command.optsWithGlobals<ListOptions>()));

  jobs
    .command('status')
    .description('Show one job')
    .argument('<job-id>', 'Job ID')
    .action((jobId: string, _options: unknown, command: Command) =>
      jobsStatusCommand(jobId, command.optsWithGlobals<GlobalOptions>()),
    );

  jobs
    .command('stop')
    .description('Request a stop; a job with no live runner is marked stopped')
    .argument('<job-id>', 'Job ID')
    .action((jobId: string, _options: unknown, command: Command) =>
      jobsStopCommand(jobId, command.optsWithGlobals<GlobalOptions>()),
    );

  // ── Search ──

  program
    .command('search')
    .description('Search publications')
    .argument('[text]', 'Free text matched against objeto, agencia, oficina and referencia')
    .option('--page <n>', 'Page number', parseInteger)
    .option('--page-size <n>', 'Results per page', parseInteger)
    .option('--objeto <text>', 'Match on objeto')
    .option('--agencia <text>', 'Match on agencia')
    .option('--pais <id-or-name>', 'Country id or name')
    .option('--rubro <id>', 'Category tag id')
    .option('--from <date>', 'Opening date lower bound (D/M/YYYY)')
    .option('--to <date>', 'Opening date upper bound (D/M/YYYY)')
    .option('--include-expired', 'Include expired publications')
    .option('--only-current', 'Only current publications')
    .option('--user-tags <ids>', 'Comma-separated tag ids', parseIdList)
    .option('--mine', 'Restrict to --user-tags')
    .action((text: string | undefined, _options: unknown, command: Command) =>
      searchCommand(text, command.optsWithGlobals<SearchOptions>()),
    );

  // ── Maintenance ──

  program
    .command('reap')
    .description('Delete finished jobs past retention and orphaned log buffers')
    .action((_options: unknown, command: Command) => reapCommand(command.optsWithGlobals<GlobalOptions>()));

  const index = program.command('index').description('Search index administration');

  index
    .command('init')
    .description('Create the publications index with the bundled mapping')
    .action((_options: unknown, command: Command) => indexInitCommand(command.optsWithGlobals<GlobalOptions>()));

  return program;
}
