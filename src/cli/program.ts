/**
 * Command-line interface
 *
 * Each command calls a tool handler and renders its result; a failed call is
 * printed on stderr and sets a non-zero exit code.
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import type { ToolResult } from '../types/index.js';
import { getConfig, overrideConfig } from '../config/index.js';
import { resetDatabase } from '../services/db/manager.js';
import { describeRecord } from '../services/records/store.js';
import { logger } from '../utils/logger.js';
import { formatDuration } from '../utils/format.js';
import { statusHandler, workStartHandler, workStopHandler } from '../tools/work.js';
import { recordDeleteHandler, recordEditHandler, recordsHandler } from '../tools/records.js';
import { reportHandler, statsHandler } from '../tools/stats.js';
import {
  projectAddHandler,
  projectListHandler,
  projectMoveHandler,
  projectRemoveHandler,
  projectRenameHandler,
} from '../tools/projects.js';
import {
  bucketBars,
  formatPeriod,
  renderBars,
  renderProjectTree,
  renderRecords,
  renderReport,
  renderStats,
  statsBars,
} from './render.js';

export interface CliIO {
  out: (text: string) => void;
  err: (text: string) => void;
}

interface GlobalOptions {
  db?: string;
  verbose?: boolean;
}

interface PeriodOptions {
  from?: string;
  to?: string;
  for?: string;
}

const defaultIO: CliIO = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
};

function parseId(value: string): number {
  const id = Number(value);
  if (!Number.isInteger(id) || id <= 0) {
    throw new InvalidArgumentError('Not a record id.');
  }
  return id;
}

function collectIds(value: string, previous: number[] | undefined): number[] {
  return [...(previous ?? []), parseId(value)];
}

function parseCount(value: string): number {
  const count = Number(value);
  if (!Number.isInteger(count) || count <= 0) {
    throw new InvalidArgumentError('Not a positive number.');
  }
  return count;
}

function periodArgs(period: string | undefined, options: PeriodOptions): Record<string, unknown> {
  return {
    period,
    from: options.from,
    to: options.to,
    for: options.for,
  };
}

function withPeriodOptions(command: Command): Command {
  return command
    .argument('[period]', 'today, yesterday, thisweek, lastweek, thismonth, lastmonth or thisyear')
    .option('--from <time>', 'Period start: date, date_time, time or offset from midnight (-1w)')
    .option('--to <time>', 'Period end (default: now)')
    .option('--for <duration>', 'Period length from its start, e.g. 1w');
}

/**
 * Build the program; `io` receives all command output
 */
export function createProgram(io: CliIO = defaultIO): Command {
  const program = new Command();

  // Prints the error and returns undefined on failure
  const unwrap = <T>(result: ToolResult<T>): T | undefined => {
    if (result.success) {
      return result.data;
    }
    io.err(chalk.red(`Error: ${result.error}`));
    process.exitCode = 1;
    return undefined;
  };

  program
    .name('timetree')
    .description('Track time on hierarchical projects')
    .version('0.1.0')
    .option('--db <path>', 'SQLite database file (overrides config)')
    .option('-v, --verbose', 'Output debug messages');

  program.hook('preAction', (thisCommand) => {
    const opts = thisCommand.optsWithGlobals<GlobalOptions>();
    if (opts.db) {
      overrideConfig({ dbPath: opts.db });
      resetDatabase();
    }
    logger.setLevel(opts.verbose ? 'debug' : getConfig().logLevel);
  });

  program
    .command('work')
    .description('Start working on a project, or log a closed record with --for or --to')
    .argument('<project>', 'Dotted project path')
    .option('--at <time>', 'Start time (default: now)')
    .option('--for <duration>', 'Record length, e.g. 1h30m')
    .option('--to <time>', 'Record end')
    .option('--note <text>', 'Free-text note')
    .option('-f, --force', 'End overlapping earlier records at the new start')
    .action(
      async (
        project: string,
        options: { at?: string; for?: string; to?: string; note?: string; force?: boolean }
      ) => {
        const data = unwrap(
          await workStartHandler({
            project,
            at: options.at,
            for: options.for,
            to: options.to,
            note: options.note,
            force: options.force ?? false,
          })
        );
        if (!data) return;
        for (const record of data.truncated) {
          io.out(chalk.yellow(`Ended ${describeRecord(record)}`));
        }
        io.out(data.message);
      }
    );

  program
    .command('done')
    .description('Stop the record in progress')
    .option('--at <time>', 'End time (default: now)')
    .action(async (options: { at?: string }) => {
      const data = unwrap(await workStopHandler({ at: options.at }));
      if (data) io.out(data.message);
    });

  program
    .command('status')
    .description('Show the record in progress')
    .action(async () => {
      const data = unwrap(await statusHandler({}));
      if (data) io.out(data.message);
    });

  withPeriodOptions(program.command('show'))
    .description('List records of a period (default: this week)')
    .option('-n, --last <count>', 'List the most recent records instead', parseCount)
    .action(async (period: string | undefined, options: PeriodOptions & { last?: number }) => {
      const data = unwrap(await recordsHandler({ ...periodArgs(period, options), last: options.last }));
      if (!data) return;
      if (data.period) io.out(chalk.dim(formatPeriod(data.period)));
      if (data.records.length === 0) {
        io.out('No records');
        return;
      }
      io.out(renderRecords(data.records, new Date()));
      io.out(`Total: ${formatDuration(data.total)}`);
    });

  withPeriodOptions(program.command('stats'))
    .description('Time per project over a period (default: this week)')
    .option('-p, --project <path>', 'Only this project and its subprojects')
    .option('-g, --graph', 'Draw bars instead of a table')
    .action(async (period: string | undefined, options: PeriodOptions & { project?: string; graph?: boolean }) => {
      const data = unwrap(await statsHandler({ ...periodArgs(period, options), project: options.project }));
      if (!data) return;
      io.out(chalk.dim(formatPeriod(data.period)));
      if (data.roots.length === 0) {
        io.out('No time recorded');
        return;
      }
      io.out(options.graph ? renderBars(statsBars(data), getConfig().barWidth) : renderStats(data));
    });

  withPeriodOptions(program.command('report'))
    .description('Time per project split into buckets')
    .option('-b, --by <bucket>', 'Bucket width: day, week, month or a duration such as 4h')
    .option('-p, --project <path>', 'Only this project and its subprojects')
    .option('-g, --graph', 'Draw the bucket totals as bars')
    .action(
      async (
        period: string | undefined,
        options: PeriodOptions & { by?: string; project?: string; graph?: boolean }
      ) => {
        const data = unwrap(
          await reportHandler({ ...periodArgs(period, options), by: options.by, project: options.project })
        );
        if (!data) return;
        io.out(chalk.dim(formatPeriod(data.period)));
        if (data.roots.length === 0) {
          io.out('No time recorded');
          return;
        }
        io.out(options.graph ? renderBars(bucketBars(data), getConfig().barWidth) : renderReport(data));
      }
    );

  program
    .command('edit')
    .description('Change the project, start or end of a record')
    .argument('<id>', 'Record id', parseId)
    .option('-p, --project <path>', 'New project')
    .option('--from <time>', 'New start')
    .option('--to <time>', 'New end')
    .action(async (id: number, options: { project?: string; from?: string; to?: string }) => {
      const data = unwrap(
        await recordEditHandler({ id, project: options.project, start: options.from, end: options.to })
      );
      if (data) io.out(`${data.message}: ${describeRecord(data.record)}`);
    });

  program
    .command('rm')
    .description('Delete records')
    .argument('<ids...>', 'Record ids', collectIds)
    .action(async (ids: number[]) => {
      const data = unwrap(await recordDeleteHandler({ ids }));
      if (data) io.out(data.message);
    });

  const project = program.command('project').description('Manage the project hierarchy');

  project
    .command('list')
    .description('Show the project tree')
    .action(async () => {
      const data = unwrap(await projectListHandler({}));
      if (!data) return;
      io.out(data.tree.length === 0 ? 'No projects' : renderProjectTree(data.tree));
    });

  project
    .command('add')
    .description('Create a project (and missing parents)')
    .argument('<path>', 'Dotted project path')
    .action(async (path: string) => {
      const data = unwrap(await projectAddHandler({ path }));
      if (data) io.out(data.message);
    });

  project
    .command('rm')
    .description('Delete a project that no record uses')
    .argument('<path>', 'Project path')
    .option('-r, --recursive', 'Also delete subprojects')
    .action(async (path: string, options: { recursive?: boolean }) => {
      const data = unwrap(await projectRemoveHandler({ path, recursive: options.recursive ?? false }));
      if (data) io.out(data.message);
    });

  project
    .command('rename')
    .description('Rename the last segment of a project path')
    .argument('<path>', 'Project path')
    .argument('<name>', 'New name')
    .action(async (path: string, name: string) => {
      const data = unwrap(await projectRenameHandler({ path, name }));
      if (data) io.out(data.message);
    });

  project
    .command('move')
    .description('Move a project under another parent (top level when omitted)')
    .argument('<path>', 'Project path')
    .argument('[parent]', 'New parent path')
    .action(async (path: string, parent: string | undefined) => {
      const data = unwrap(await projectMoveHandler({ path, parent: parent ?? null }));
      if (data) io.out(data.message);
    });

  program
    .command('mcp')
    .description('Serve the tools over MCP on stdio')
    .action(async () => {
      const { startServer } = await import('../server.js');
      await startServer();
    });

  return program;
}
