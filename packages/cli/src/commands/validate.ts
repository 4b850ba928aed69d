// packages/cli/src/commands/validate.ts — Check a workflow document without running it

import { ConfigValidationError, loadWorkflow } from '@cogflow/core';
import chalk from 'chalk';

import { formatIssues } from '../render.js';
import { createToolRegistry, printError } from '../utils.js';

interface ValidateOptions {
  json?: boolean;
}

export async function validateCommand(file: string, options: ValidateOptions): Promise<void> {
  try {
    const config = loadWorkflow(file, { tools: createToolRegistry() });
    if (options.json) {
      console.log(JSON.stringify({ valid: true, workflow: config.flow.name, issues: [] }, null, 2));
      return;
    }
    console.log(
      chalk.green(`✓ ${config.flow.name} is valid`) +
        chalk.gray(` (${config.nodes.length} nodes, ${config.edges.length} edges, ${config.state.fields.length} state fields)`),
    );
  } catch (error) {
    process.exitCode = 1;
    if (!(error instanceof ConfigValidationError)) {
      printError(error);
      return;
    }
    if (options.json) {
      console.log(JSON.stringify({ valid: false, issues: error.issues }, null, 2));
      return;
    }
    const count = error.issues.length;
    console.error(chalk.red(`✗ ${file}: ${count} issue${count === 1 ? '' : 's'}`));
    for (const line of formatIssues(error.issues)) console.error(line);
  }
}
