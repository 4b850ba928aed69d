// packages/cli/src/commands/plan.ts — Show the compiled execution plan

import { buildStateRecord, compileWorkflow, describePlan, loadWorkflow } from '@cogflow/core';

import { formatPlan } from '../render.js';
import { createToolRegistry, printError } from '../utils.js';

interface PlanOptions {
  json?: boolean;
}

export async function planCommand(file: string, options: PlanOptions): Promise<void> {
  try {
    const config = loadWorkflow(file, { tools: createToolRegistry() });
    const plan = compileWorkflow(config, buildStateRecord(config.state.fields));
    const description = describePlan(plan);

    if (options.json) {
      console.log(JSON.stringify(description, null, 2));
      return;
    }
    for (const line of formatPlan(description)) console.log(line);
  } catch (error) {
    printError(error);
    process.exitCode = 1;
  }
}
