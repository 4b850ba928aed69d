// packages/core/src/engine/orchestrator.ts

import { EventEmitter } from 'eventemitter3';
import { readWorkflowFile } from '../config/loader.js';
import { validateWorkflow } from '../config/validator.js';
import { type StateDelta, type StateSnapshot, buildStateRecord } from '../state/state-record.js';
import { NoopTracker } from '../observability/trackers.js';
import { isPlainObject } from '../state/values.js';
import type { ObservabilityTracker, RunRepository, ToolInvoker } from '../types/collaborators.js';
import type { WorkflowConfig } from '../types/config.js';
import type { EngineEvent } from '../types/events.js';
import type { LlmClient } from '../types/llm.js';
import type { ExecutionPlan, ForkEdge, NodeDescriptor } from '../types/plan.js';
import type { GateResult, NodeResult, RunError, RunOutcome, RunPhase } from '../types/run.js';
import { END, MAX_TIMEOUT_SEC, START } from '../utils/constants.js';
import { ControlFlowError, NodeExecutionError, QualityGateError, WorkflowTimeoutError } from '../utils/errors.js';
import { generateRunId } from '../utils/id.js';
import { type Logger, silentLogger } from '../utils/logger.js';
import { CancellationError, CancellationToken } from './cancellation.js';
import { EventBus } from './event-bus.js';
import { evaluateGates } from './gates.js';
import { compileWorkflow } from './graph-compiler.js';
import { LoopController } from './loop-controller.js';
import { NodeExecutor } from './node-executor.js';
import { selectRoute } from './router.js';
import { toRunError } from './run-error.js';
import { RunMetricsCollector, emptyNodeMetrics } from './run-metrics.js';

interface OrchestratorEvents {
  event: (event: EngineEvent) => void;
}

export interface OrchestratorOptions {
  llm: LlmClient;
  /** Registered tools; node tool names missing here fail validation. */
  tools?: ToolInvoker;
  repository?: RunRepository;
  tracker?: ObservabilityTracker;
  logger?: Logger;
}

export interface RunOptions {
  /** Overrides `config.execution.timeout`; capped at MAX_TIMEOUT_SEC. */
  timeoutMs?: number;
  /** Caller-side cancellation. */
  token?: CancellationToken;
}

interface RunContext {
  runId: string;
  plan: ExecutionPlan;
  token: CancellationToken;
  loops: LoopController;
  metrics: RunMetricsCollector;
  nodeErrors: RunError[];
  /** Latest state on the main path, kept for partial results on failure. */
  progress: { state: StateSnapshot };
  /** False inside fork branches. */
  mainPath: boolean;
}

interface WalkResult {
  state: StateSnapshot;
  delta: StateDelta;
}

function peekWorkflowName(raw: unknown): string {
  if (isPlainObject(raw) && isPlainObject(raw.flow) && typeof raw.flow.name === 'string') {
    return raw.flow.name;
  }
  return 'unknown';
}

/**
 * Drives a workflow from document to outcome:
 * Loaded → Validated → StateInitialized → Running → Completed | Failed.
 * `run` never throws; every failure is reported in the returned RunOutcome.
 */
export class Orchestrator extends EventEmitter<OrchestratorEvents> {
  private readonly eventBus = new EventBus();
  private readonly executor: NodeExecutor;
  private readonly logger: Logger;
  private readonly tracker: ObservabilityTracker;

  constructor(private readonly options: OrchestratorOptions) {
    super();
    this.logger = options.logger ?? silentLogger;
    this.tracker = options.tracker ?? new NoopTracker();
    this.executor = new NodeExecutor({ llm: options.llm, tools: options.tools, logger: this.logger });
    this.eventBus.on('event', (event) => this.emit('event', event));
  }

  /** Run a parsed workflow document (or an already validated config). */
  async run(
    document: unknown,
    inputs: Record<string, unknown> = {},
    options: RunOptions = {},
  ): Promise<RunOutcome> {
    return this.execute(() => document, inputs, options);
  }

  /** Read, validate and run a workflow file. */
  async runFile(
    filePath: string,
    inputs: Record<string, unknown> = {},
    options: RunOptions = {},
  ): Promise<RunOutcome> {
    return this.execute(() => readWorkflowFile(filePath), inputs, options);
  }

  private async execute(
    load: () => unknown,
    inputs: Record<string, unknown>,
    options: RunOptions,
  ): Promise<RunOutcome> {
    const startTime = Date.now();
    const metrics = new RunMetricsCollector();
    const nodeErrors: RunError[] = [];
    const progress: { state: StateSnapshot } = { state: Object.freeze({}) };
    let runId = generateRunId();
    let workflowName = 'unknown';
    let phase: RunPhase = 'loaded';
    let persisted = false;
    let gateResults: GateResult[] = [];
    let deployBlocked = false;
    let error: RunError | undefined;

    try {
      const raw = load();
      workflowName = peekWorkflowName(raw);

      // 1. Validate: nothing below runs on an invalid document.
      const config = validateWorkflow(raw, { tools: this.options.tools });
      workflowName = config.flow.name;
      phase = 'validated';

      // 2. Build and initialize state.
      const stateType = buildStateRecord(config.state.fields);
      progress.state = stateType.initialize(inputs);
      phase = 'state-initialized';

      // 3. Compile.
      const plan = compileWorkflow(config, stateType);

      // 4. Run record (best-effort).
      const created = await this.createRunRecord(config, inputs);
      if (created) {
        runId = created;
        persisted = true;
      }

      phase = 'running';
      this.logger.info(`Run ${runId} started: ${workflowName}`);
      this.eventBus.emitEvent({ type: 'run.started', runId, workflow: workflowName, timestamp: '' });

      // 5-6. Drive the graph.
      const ctx: RunContext = {
        runId,
        plan,
        token: new CancellationToken(),
        loops: new LoopController(),
        metrics,
        nodeErrors,
        progress,
        mainPath: true,
      };
      await this.runWithDeadline(ctx, options);

      // 7. Quality gates.
      if (plan.gates && plan.gates.gates.length > 0) {
        const evaluation = evaluateGates(plan.gates, metrics.snapshot(Date.now() - startTime));
        gateResults = evaluation.results;
        for (const result of gateResults) {
          this.eventBus.emitEvent({ type: 'gate.evaluated', runId, result, timestamp: '' });
        }
        const failedNames = evaluation.failed.map((g) => g.metric);
        if (evaluation.decision === 'fail') {
          throw new QualityGateError(failedNames);
        }
        if (evaluation.decision === 'block_deploy') {
          deployBlocked = true;
          this.logger.warn(`Quality gates failed, deploy blocked: ${failedNames.join(', ')}`);
        } else if (evaluation.decision === 'warn') {
          this.logger.warn(`Quality gates failed: ${failedNames.join(', ')}`);
        }
      }

      phase = 'completed';
    } catch (err) {
      error = toRunError(err);
    }

    const outcome: RunOutcome = Object.freeze({
      runId,
      workflowName,
      status: error ? 'failed' : 'completed',
      phase,
      state: progress.state,
      metrics: metrics.snapshot(Date.now() - startTime),
      ...(error ? { error } : {}),
      nodeErrors,
      gateResults,
      deployBlocked,
    });

    // 8. Finalize (best-effort).
    if (persisted) {
      await this.bestEffort('repository.update', () => this.options.repository?.update(runId, outcome));
    }
    await this.bestEffort('tracker.recordRunEnd', () => this.tracker.recordRunEnd(runId, outcome));

    // Listener failures are logged; the outcome is already settled.
    if (outcome.error) {
      this.logger.error(`Run ${runId} failed: ${outcome.error.message}`);
      const runError = outcome.error;
      await this.bestEffort('run.failed listener', () =>
        this.eventBus.emitEvent({ type: 'run.failed', runId, error: runError, timestamp: '' }),
      );
    } else {
      this.logger.info(`Run ${runId} completed in ${outcome.metrics.durationMs}ms`);
      await this.bestEffort('run.completed listener', () =>
        this.eventBus.emitEvent({
          type: 'run.completed',
          runId,
          durationMs: outcome.metrics.durationMs,
          costUsd: outcome.metrics.costUsd,
          totalTokens: outcome.metrics.totalTokens,
          deployBlocked,
          timestamp: '',
        }),
      );
    }
    return outcome;
  }

  private async runWithDeadline(ctx: RunContext, options: RunOptions): Promise<void> {
    const timeoutMs = Math.min(options.timeoutMs ?? ctx.plan.timeoutMs, MAX_TIMEOUT_SEC * 1000);
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      ctx.token.cancel(`Run exceeded ${timeoutMs}ms`);
    }, timeoutMs);
    const forwardCancel = () => ctx.token.cancel('Run cancelled by caller');
    options.token?.onCancel(forwardCancel);

    try {
      await this.walk(ctx, START, null, ctx.progress.state);
    } catch (err) {
      if (timedOut && err instanceof CancellationError) throw new WorkflowTimeoutError(timeoutMs);
      throw err;
    } finally {
      clearTimeout(timer);
      options.token?.offCancel(forwardCancel);
    }
  }

  /**
   * Follow edges from `start` until END or `stopAt` (a fork's join node).
   * Returns the resulting state and the delta accumulated along the way.
   */
  private async walk(
    ctx: RunContext,
    start: string,
    stopAt: string | null,
    base: StateSnapshot,
  ): Promise<WalkResult> {
    const { stateType } = ctx.plan;
    let state = base;
    let delta: StateDelta = {};
    let current = start;

    const apply = (change: StateDelta) => {
      state = stateType.merge(state, change);
      delta = stateType.combine([delta, change]);
      if (ctx.mainPath) ctx.progress.state = state;
    };

    while (current !== END && current !== stopAt) {
      ctx.token.throwIfCancelled();

      if (current !== START) {
        const node = ctx.plan.nodes.get(current);
        if (!node) throw new ControlFlowError(`Unknown node "${current}"`, current);
        const result = await this.runNode(ctx, node, state);
        if (result) apply(result.delta);
      }

      const edge = ctx.plan.edges.get(current);
      if (!edge) throw new ControlFlowError(`Node "${current}" has no outgoing edge`, current);

      switch (edge.kind) {
        case 'linear':
          current = edge.to;
          break;
        case 'conditional':
          current = selectRoute(edge, state, this.logger);
          break;
        case 'loop': {
          const decision = ctx.loops.advance(edge, state);
          ctx.metrics.recordLoopIteration(edge.from, decision.capHit);
          if (decision.capHit) {
            this.logger.warn(`Loop on ${edge.from} hit max_iterations (${edge.maxIterations}); continuing to ${edge.exitTo}`);
          }
          this.eventBus.emitEvent({
            type: 'loop.iteration',
            runId: ctx.runId,
            nodeId: edge.from,
            iteration: decision.iteration,
            maxIterations: edge.maxIterations,
            conditionMet: decision.conditionMet,
            next: decision.next,
            timestamp: '',
          });
          current = decision.next;
          break;
        }
        case 'fork':
          apply(await this.runFork(ctx, edge, state));
          current = edge.join;
          break;
      }
    }

    return { state, delta };
  }

  /**
   * Run every branch concurrently against the same snapshot, then combine their
   * deltas in declaration order. A failing branch cancels its siblings.
   */
  private async runFork(ctx: RunContext, edge: ForkEdge, base: StateSnapshot): Promise<StateDelta> {
    const { stateType } = ctx.plan;
    this.eventBus.emitEvent({
      type: 'fork.started',
      runId: ctx.runId,
      from: edge.from,
      branches: [...edge.branches],
      join: edge.join,
      timestamp: '',
    });

    const forkToken = ctx.token.child();
    const settled = await Promise.allSettled(
      edge.branches.map(async (branch) => {
        const branchCtx: RunContext = {
          ...ctx,
          token: forkToken,
          loops: ctx.loops.fork(),
          mainPath: false,
        };
        try {
          return (await this.walk(branchCtx, branch, edge.join, base)).delta;
        } catch (err) {
          forkToken.cancel(`Sibling branch "${branch}" failed`);
          throw err;
        }
      }),
    );

    const deltas: StateDelta[] = [];
    const failures: unknown[] = [];
    for (const result of settled) {
      if (result.status === 'fulfilled') deltas.push(result.value);
      else failures.push(result.reason);
    }
    if (failures.length > 0) {
      // Report the branch that actually failed, not the siblings it cancelled.
      throw failures.find((f) => !(f instanceof CancellationError)) ?? failures[0];
    }

    const conflicts = stateType.conflictingFields(deltas);
    if (conflicts.length > 0) {
      this.logger.warn(
        `Fork from ${edge.from}: branches wrote the same field(s) ${conflicts.join(', ')}; the later-declared branch wins`,
      );
    }
    this.eventBus.emitEvent({
      type: 'fork.joined',
      runId: ctx.runId,
      from: edge.from,
      join: edge.join,
      conflicts,
      timestamp: '',
    });
    return stateType.combine(deltas);
  }

  /** Null when the node failed but is marked non-fatal. */
  private async runNode(
    ctx: RunContext,
    node: NodeDescriptor,
    state: StateSnapshot,
  ): Promise<NodeResult | null> {
    const { runId } = ctx;
    this.logger.debug(`Node ${node.id} started`);
    this.eventBus.emitEvent({ type: 'node.started', runId, nodeId: node.id, model: node.llm.model, timestamp: '' });
    await this.bestEffort('tracker.recordNodeStart', () => this.tracker.recordNodeStart(runId, node.id));

    const start = Date.now();
    try {
      const result = await this.executor.execute(node, state, {
        token: ctx.token,
        stateFields: ctx.plan.stateType.fieldNames,
      });
      ctx.metrics.recordNode(node.id, 'completed', result.metrics);
      this.logger.debug(`Node ${node.id} completed in ${result.metrics.durationMs}ms`);
      this.eventBus.emitEvent({
        type: 'node.completed',
        runId,
        nodeId: node.id,
        fields: Object.keys(result.delta),
        metrics: result.metrics,
        timestamp: '',
      });
      await this.bestEffort('tracker.recordNodeEnd', () =>
        this.tracker.recordNodeEnd(runId, node.id, result.metrics),
      );
      return result;
    } catch (err) {
      if (err instanceof CancellationError) throw err;

      const failure = new NodeExecutionError(node.id, err instanceof Error ? err : new Error(String(err)));
      const runError = toRunError(failure);
      const metrics = emptyNodeMetrics(Date.now() - start);
      ctx.metrics.recordNode(node.id, 'failed', metrics);
      this.eventBus.emitEvent({
        type: 'node.failed',
        runId,
        nodeId: node.id,
        error: runError,
        fatal: node.breakOnError,
        timestamp: '',
      });
      await this.bestEffort('tracker.recordNodeEnd', () =>
        this.tracker.recordNodeEnd(runId, node.id, metrics),
      );

      if (node.breakOnError) throw failure;
      this.logger.warn(`Node ${node.id} failed, continuing (break_on_error: false): ${runError.message}`);
      ctx.nodeErrors.push(runError);
      return null;
    }
  }

  private async createRunRecord(
    config: WorkflowConfig,
    inputs: Record<string, unknown>,
  ): Promise<string | null> {
    const repository = this.options.repository;
    if (!repository) return null;
    try {
      return await repository.create({
        workflowName: config.flow.name,
        inputs,
        config,
        startedAt: new Date().toISOString(),
      });
    } catch (err) {
      this.logger.warn(`repository.create failed, continuing without a run record: ${describeError(err)}`);
      return null;
    }
  }

  /** Collaborator calls never affect the run; failures are only logged. */
  private async bestEffort(label: string, call: () => void | Promise<void> | undefined): Promise<void> {
    try {
      await call();
    } catch (err) {
      this.logger.warn(`${label} failed: ${describeError(err)}`);
    }
  }
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
