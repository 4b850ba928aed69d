// packages/cli/src/render.ts — Terminal rendering for engine events

import type { EngineEvent, PlanDescription, RunOutcome, StoredRun, ValidationIssue } from '@cogflow/core';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';

function seconds(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}

function statusColor(status: string): (text: string) => string {
  if (status === 'completed') return chalk.green;
  if (status === 'failed') return chalk.red;
  return chalk.yellow;
}

/** One printable block per event. */
export function formatEvent(event: EngineEvent): string {
  switch (event.type) {
    case 'run.started':
      return chalk.gray(`\n━━━ Run ${event.runId} ━━━\nWorkflow: ${event.workflow}\n`);

    case 'run.completed': {
      const lines = [
        chalk.green('\n━━━ Run Complete ━━━'),
        chalk.cyan(`  Cost:     $${event.costUsd.toFixed(4)}`),
        chalk.cyan(`  Tokens:   ${event.totalTokens.toLocaleString('en-US')}`),
        chalk.cyan(`  Duration: ${seconds(event.durationMs)}`),
      ];
      if (event.deployBlocked) lines.push(chalk.yellow('  Deploy blocked by quality gates'));
      return lines.join('\n');
    }

    case 'run.failed': {
      const where = event.error.nodeId ? ` (node ${event.error.nodeId})` : '';
      return chalk.red(`\n━━━ Run Failed ━━━\n  ${event.error.type}${where}: ${event.error.message}`);
    }

    case 'node.started':
      return chalk.blue(`▶ ${event.nodeId} (${event.model})`);

    case 'node.completed':
      return chalk.gray(
        `  ✓ ${event.nodeId} (${seconds(event.metrics.durationMs)}, ${event.metrics.totalTokens} tokens) → ${event.fields.join(', ')}`,
      );

    case 'node.failed':
      return event.fatal
        ? chalk.red(`  ✗ ${event.nodeId}: ${event.error.message}`)
        : chalk.yellow(`  ! ${event.nodeId} failed, continuing: ${event.error.message}`);

    case 'loop.iteration': {
      const color = event.conditionMet ? chalk.green : chalk.yellow;
      const reason = event.conditionMet ? ' (condition met)' : '';
      return color(`  ↻ ${event.nodeId} ${event.iteration}/${event.maxIterations}${reason} → ${event.next}`);
    }

    case 'fork.started':
      return chalk.magenta(`  ⑂ ${event.from} → ${event.branches.join(' | ')} (join ${event.join})`);

    case 'fork.joined': {
      const conflicts = event.conflicts.length > 0 ? `, conflicting fields: ${event.conflicts.join(', ')}` : '';
      return chalk.magenta(`  ⑂ joined at ${event.join}${conflicts}`);
    }

    case 'gate.evaluated':
      return event.result.passed
        ? chalk.green(`  ✓ gate ${event.result.message}`)
        : chalk.red(`  ✗ gate ${event.result.message}`);
  }
}

/**
 * Prints events as they arrive, with a spinner naming the nodes still running.
 * The spinner is only drawn on an interactive terminal.
 */
export class RunRenderer {
  private spinner: Ora | null = null;
  private readonly active = new Set<string>();

  constructor(private readonly interactive = process.stderr.isTTY === true) {}

  handle(event: EngineEvent): void {
    this.spinner?.clear();
    console.log(formatEvent(event));

    if (event.type === 'node.started') this.active.add(event.nodeId);
    if (event.type === 'node.completed' || event.type === 'node.failed') this.active.delete(event.nodeId);
    if (event.type === 'run.completed' || event.type === 'run.failed') this.active.clear();
    this.refreshSpinner();
  }

  stop(): void {
    this.spinner?.stop();
    this.spinner = null;
  }

  private refreshSpinner(): void {
    if (!this.interactive) return;
    if (this.active.size === 0) {
      this.stop();
      return;
    }
    const text = `Running ${[...this.active].join(', ')}...`;
    if (this.spinner) {
      this.spinner.text = text;
      this.spinner.render();
    } else {
      this.spinner = ora({ text, color: 'blue' }).start();
    }
  }
}

export function formatIssues(issues: readonly ValidationIssue[]): string[] {
  return issues.map((issue) => {
    const hint = issue.suggestion ? chalk.gray(` (did you mean '${issue.suggestion}'?)`) : '';
    const location = issue.path ? chalk.bold(issue.path) : chalk.bold('<document>');
    return `  ${chalk.red('✗')} ${location}: ${issue.message}${hint}`;
  });
}

function describeEdge(edge: PlanDescription['edges'][number]): string {
  switch (edge.kind) {
    case 'linear':
      return `${edge.from} → ${edge.to}`;
    case 'conditional':
      return `${edge.from} ⇒ ${edge.routes.map((r) => `[${r.condition}] → ${r.to}`).join(', ')}`;
    case 'loop':
      return `${edge.from} ↻ while !${edge.conditionField} (max ${edge.maxIterations}), then → ${edge.exitTo}`;
    case 'fork':
      return `${edge.from} ⑂ ${edge.branches.join(' | ')} → join ${edge.join}`;
  }
}

export function formatPlan(plan: PlanDescription): string[] {
  const title = plan.version ? `${plan.workflow} v${plan.version}` : plan.workflow;
  const lines = [chalk.bold(title), '', chalk.bold('Nodes')];
  for (const node of plan.nodes) {
    const tools = node.tools.length > 0 ? `, tools: ${node.tools.join(', ')}` : '';
    lines.push(`  ${node.id} (${node.model}) → ${node.outputs.join(', ')}${tools}`);
  }
  lines.push('', chalk.bold('Edges'));
  for (const edge of plan.edges) lines.push(`  ${describeEdge(edge)}`);
  return lines;
}

/** Final summary after a run, followed by the terminal state. */
export function printRunSummary(outcome: RunOutcome): void {
  const { metrics } = outcome;
  console.log(chalk.bold('\nRun Summary'));
  console.log(chalk.gray('-'.repeat(40)));
  console.log(`  Run:        ${chalk.white(outcome.runId)}`);
  console.log(`  Workflow:   ${chalk.white(outcome.workflowName)}`);
  console.log(`  Status:     ${statusColor(outcome.status)(outcome.status)}`);
  console.log(`  Cost:       ${chalk.cyan(`$${metrics.costUsd.toFixed(4)}`)}`);
  console.log(`  Tokens:     ${chalk.cyan(metrics.totalTokens.toLocaleString('en-US'))}`);
  console.log(`  Duration:   ${chalk.cyan(seconds(metrics.durationMs))}`);
  console.log(`  Nodes:      ${chalk.cyan(String(metrics.nodeCount))}`);
  if (outcome.nodeErrors.length > 0) {
    console.log(`  Skipped:    ${chalk.yellow(outcome.nodeErrors.map((e) => e.nodeId ?? '?').join(', '))}`);
  }
  console.log(chalk.gray('-'.repeat(40)));
  console.log(JSON.stringify(outcome.state, null, 2));
}

export function formatRunRow(run: StoredRun): string {
  const cost = run.metrics ? `$${run.metrics.costUsd.toFixed(4)}` : '-';
  return [
    chalk.white(run.id),
    statusColor(run.status)(run.status.padEnd(9)),
    run.workflowName,
    chalk.gray(run.startedAt),
    chalk.cyan(cost),
  ].join('  ');
}
