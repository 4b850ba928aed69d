// packages/cli/src/program.ts — Command tree for the cogflow CLI

import { VERSION } from '@cogflow/core';
import { Command, Option } from 'commander';

import { planCommand } from './commands/plan.js';
import { runCommand } from './commands/run.js';
import type { RunCommandOptions } from './commands/run.js';
import { runsCommand } from './commands/runs.js';
import { validateCommand } from './commands/validate.js';
import { collect, parsePositiveInt, parseTimeoutSeconds } from './utils.js';

export const DEFAULT_LLM_COMMAND = 'codex exec';

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('cogflow')
    .description('Run declarative LLM workflows defined in YAML')
    .version(VERSION)
    .option('--verbose', 'Enable debug logging');

  program
    .command('validate')
    .description('Validate a workflow document and report every issue')
    .argument('<file>', 'Workflow YAML or JSON file')
    .option('--json', 'Machine-readable output', false)
    .action(validateCommand);

  program
    .command('plan')
    .description('Compile a workflow and print its execution plan')
    .argument('<file>', 'Workflow YAML or JSON file')
    .option('--json', 'Print the plan as JSON', false)
    .action(planCommand);

  program
    .command('run')
    .description('Run a workflow')
    .argument('<file>', 'Workflow YAML or JSON file')
    .option('-i, --input <key=value>', 'Initial state value (repeatable)', collect, [])
    .option('--db <path>', 'Run history database (default: .cogflow/runs.db)')
    .option('--no-persist', 'Do not record the run')
    .option('--timeout <seconds>', 'Whole-run time limit', parseTimeoutSeconds)
    .option('--llm-command <command>', 'Command that answers prompts on stdin', DEFAULT_LLM_COMMAND)
    .option('--json', 'Print the run outcome as JSON', false)
    .action((file: string, options: RunCommandOptions, command: Command) =>
      runCommand(file, { ...options, verbose: command.optsWithGlobals().verbose === true }),
    );

  program
    .command('runs')
    .description('List recorded runs, or show one run in full')
    .argument('[run-id]', 'Run ID to show')
    .addOption(new Option('--status <status>', 'Filter by status').choices(['running', 'completed', 'failed']))
    .option('--workflow <name>', 'Filter by workflow name')
    .option('--limit <n>', 'Max results', parsePositiveInt, 20)
    .option('--db <path>', 'Run history database (default: .cogflow/runs.db)')
    .option('--json', 'Machine-readable output', false)
    .action(runsCommand);

  return program;
}
