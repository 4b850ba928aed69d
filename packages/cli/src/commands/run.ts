// packages/cli/src/commands/run.ts — Execute a workflow file

import {
  CommandLlmClient,
  ConfigValidationError,
  type LlmClient,
  LoggingTracker,
  Orchestrator,
  SqliteRunRepository,
  readWorkflowFile,
  validateWorkflow,
} from '@cogflow/core';
import chalk from 'chalk';

import { RunRenderer, formatIssues, printRunSummary } from '../render.js';
import { createCliLogger, createToolRegistry, openRunDatabase, parseInputs, printError } from '../utils.js';

export interface RunCommandOptions {
  input?: string[];
  db?: string;
  /** Seconds; overrides `config.execution.timeout`. */
  timeout?: number;
  llmCommand: string;
  persist?: boolean;
  json?: boolean;
  verbose?: boolean;
}

/** Exit codes: 0 completed, 1 bad invocation or document, 2 run failed. */
export async function executeRun(file: string, options: RunCommandOptions, llm: LlmClient): Promise<number> {
  const logger = createCliLogger(options.verbose);

  const tools = createToolRegistry();
  const raw = readWorkflowFile(file);
  const config = validateWorkflow(raw, { tools });
  const inputs = parseInputs(config.state.fields, options.input ?? []);

  const db = options.persist === false ? null : openRunDatabase(options.db);
  const renderer = options.json ? null : new RunRenderer();
  try {
    const orchestrator = new Orchestrator({
      llm,
      tools,
      repository: db ? new SqliteRunRepository(db) : undefined,
      tracker: new LoggingTracker(logger),
      logger,
    });
    if (renderer) orchestrator.on('event', (event) => renderer.handle(event));

    const outcome = await orchestrator.run(raw, inputs, {
      timeoutMs: options.timeout !== undefined ? options.timeout * 1000 : undefined,
    });
    renderer?.stop();

    if (options.json) {
      console.log(JSON.stringify(outcome, null, 2));
    } else {
      printRunSummary(outcome);
    }
    return outcome.status === 'completed' ? 0 : 2;
  } finally {
    renderer?.stop();
    db?.close();
  }
}

export async function runCommand(file: string, options: RunCommandOptions): Promise<void> {
  try {
    const llm = new CommandLlmClient({ command: options.llmCommand, logger: createCliLogger(options.verbose) });
    process.exitCode = await executeRun(file, options, llm);
  } catch (error) {
    process.exitCode = 1;
    if (error instanceof ConfigValidationError) {
      console.error(chalk.red(`✗ ${file} is not a valid workflow`));
      for (const line of formatIssues(error.issues)) console.error(line);
      return;
    }
    printError(error);
  }
}
