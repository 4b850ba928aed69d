// packages/core/src/utils/errors.ts

export interface ValidationIssue {
  /** Machine-readable issue code, e.g. `unknown-node` or `type-mismatch`. */
  code: string;
  message: string;
  /** Dotted location inside the workflow document. */
  path: string;
  suggestion?: string;
}

function formatIssue(issue: ValidationIssue): string {
  const hint = issue.suggestion ? ` Did you mean '${issue.suggestion}'?` : '';
  return `${issue.path ? `${issue.path}: ` : ''}${issue.message}${hint}`;
}

export class ConfigValidationError extends Error {
  constructor(public readonly issues: ValidationIssue[]) {
    super(
      issues.length === 1
        ? `Invalid workflow config: ${formatIssue(issues[0])}`
        : `Invalid workflow config (${issues.length} issues):\n${issues.map((i) => `  - ${formatIssue(i)}`).join('\n')}`,
    );
    this.name = 'ConfigValidationError';
  }
}

export class StateError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'StateError';
  }
}

export class TemplateError extends Error {
  constructor(
    message: string,
    public readonly field: string,
    public readonly suggestion?: string,
  ) {
    super(suggestion ? `${message} Did you mean '${suggestion}'?` : message);
    this.name = 'TemplateError';
  }
}

export class ToolExecutionError extends Error {
  constructor(
    message: string,
    public readonly toolName: string,
  ) {
    super(message);
    this.name = 'ToolExecutionError';
  }
}

export class OutputValidationError extends Error {
  constructor(
    public readonly nodeId: string,
    public readonly attempts: number,
    public readonly issues: string[],
  ) {
    super(
      `Node '${nodeId}' produced invalid output after ${attempts} attempt(s): ${issues.join('; ')}`,
    );
    this.name = 'OutputValidationError';
  }
}

export class ControlFlowError extends Error {
  constructor(
    message: string,
    public readonly nodeId?: string,
  ) {
    super(message);
    this.name = 'ControlFlowError';
  }
}

export class WorkflowTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Workflow exceeded its time limit of ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/** Wraps any failure raised while a single node was executing. */
export class NodeExecutionError extends Error {
  constructor(
    public readonly nodeId: string,
    public readonly cause: Error,
  ) {
    super(`Node '${nodeId}' failed: ${cause.message}`);
    this.name = 'NodeExecutionError';
  }
}

export class ExpressionError extends Error {
  constructor(
    message: string,
    public readonly position?: number,
  ) {
    super(position === undefined ? message : `${message} at position ${position}`);
    this.name = 'ExpressionError';
  }
}

export class QualityGateError extends Error {
  constructor(public readonly failedGates: string[]) {
    super(`Quality gates failed: ${failedGates.join(', ')}`);
    this.name = 'QualityGateError';
  }
}

export class ModelError extends Error {
  constructor(
    message: string,
    public readonly provider?: string,
    public readonly model?: string,
    public readonly exitCode?: number,
  ) {
    super(message);
    this.name = 'ModelError';
  }

  get isTimeout(): boolean {
    return this.message.includes('timed out') || this.message.includes('ETIMEDOUT');
  }
}

export class DatabaseError extends Error {
  constructor(
    message: string,
    public readonly operation?: string,
  ) {
    super(message);
    this.name = 'DatabaseError';
  }
}
