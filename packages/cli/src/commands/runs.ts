// packages/cli/src/commands/runs.ts — Run history from the local database

import { type RunStatus, SqliteRunRepository } from '@cogflow/core';
import chalk from 'chalk';

import { formatRunRow } from '../render.js';
import { openRunDatabase, printError } from '../utils.js';

interface RunsOptions {
  status?: RunStatus;
  workflow?: string;
  limit: number;
  db?: string;
  json?: boolean;
}

export async function runsCommand(runId: string | undefined, options: RunsOptions): Promise<void> {
  const db = openRunDatabase(options.db);
  try {
    const repository = new SqliteRunRepository(db);

    if (runId) {
      const run = repository.get(runId);
      if (!run) {
        console.error(chalk.red(`Run not found: ${runId}`));
        process.exitCode = 1;
        return;
      }
      console.log(JSON.stringify(run, null, 2));
      return;
    }

    const runs = repository.list({ status: options.status, workflowName: options.workflow, limit: options.limit });
    if (options.json) {
      console.log(JSON.stringify(runs, null, 2));
      return;
    }
    if (runs.length === 0) {
      console.log(chalk.gray('No runs recorded.'));
      return;
    }
    for (const run of runs) console.log(formatRunRow(run));
  } catch (error) {
    printError(error);
    process.exitCode = 1;
  } finally {
    db.close();
  }
}
