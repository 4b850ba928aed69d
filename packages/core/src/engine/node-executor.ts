// packages/core/src/engine/node-executor.ts

import { calculateCost } from '../models/pricing.js';
import { describeOutputFields } from '../schema/output-schema.js';
import type { StateSnapshot } from '../state/state-record.js';
import { resolveInputs, resolveTemplate } from '../template/resolver.js';
import type { ToolInvoker } from '../types/collaborators.js';
import type {
  ChatMessage,
  LlmCallOptions,
  LlmClient,
  LlmUsage,
  ToolCall,
  ToolSpec,
} from '../types/llm.js';
import type { NodeDescriptor } from '../types/plan.js';
import type { NodeMetrics, NodeResult } from '../types/run.js';
import { OutputValidationError, ToolExecutionError } from '../utils/errors.js';
import { type Logger, silentLogger } from '../utils/logger.js';
import type { CancellationToken } from './cancellation.js';

export interface NodeExecutorOptions {
  llm: LlmClient;
  tools?: ToolInvoker;
  logger?: Logger;
}

export interface ExecuteContext {
  token: CancellationToken;
  /** Declared state field names, for placeholder checks. */
  stateFields: readonly string[];
}

class MetricsRecorder {
  private readonly start = Date.now();
  private inputTokens = 0;
  private outputTokens = 0;
  private costUsd = 0;
  private llmCalls = 0;
  toolCalls = 0;

  constructor(private readonly model: string) {}

  recordUsage(usage: LlmUsage): void {
    this.llmCalls++;
    this.inputTokens += usage.inputTokens;
    this.outputTokens += usage.outputTokens;
    this.costUsd += usage.costUsd ?? calculateCost(this.model, usage.inputTokens, usage.outputTokens);
  }

  finish(retries: number): NodeMetrics {
    return {
      durationMs: Date.now() - this.start,
      inputTokens: this.inputTokens,
      outputTokens: this.outputTokens,
      totalTokens: this.inputTokens + this.outputTokens,
      costUsd: this.costUsd,
      llmCalls: this.llmCalls,
      toolCalls: this.toolCalls,
      retries,
    };
  }
}

function renderToolOutput(output: unknown): string {
  if (typeof output === 'string') return output;
  return JSON.stringify(output) ?? String(output);
}

export function buildCorrectionPrompt(node: NodeDescriptor, issues: string[]): string {
  return [
    'Your previous reply did not match the required output format.',
    `Problems: ${issues.join('; ')}`,
    `Reply again with a JSON object containing exactly these fields: ${describeOutputFields(node.outputSchema)}.`,
  ].join('\n');
}

/**
 * Runs one node against a read-only snapshot: resolve its inputs and prompt, run the
 * tool-calling loop if the node has tools, then extract a validated structured
 * output. Returns the delta; never touches shared state.
 */
export class NodeExecutor {
  private readonly logger: Logger;

  constructor(private readonly options: NodeExecutorOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  async execute(node: NodeDescriptor, snapshot: StateSnapshot, ctx: ExecuteContext): Promise<NodeResult> {
    const inputs = resolveInputs(node.inputs, snapshot, ctx.stateFields);
    const prompt = resolveTemplate(node.prompt, snapshot, ctx.stateFields, inputs);
    const metrics = new MetricsRecorder(node.llm.model);
    const callOptions: LlmCallOptions = { settings: node.llm, signal: ctx.token.signal };
    const messages: ChatMessage[] = [{ role: 'user', content: prompt }];

    if (node.tools.length > 0) {
      await this.runToolLoop(node, messages, metrics, callOptions, ctx.token);
    }

    const attempts = node.maxRetries + 1;
    let issues: string[] = [];
    for (let attempt = 1; attempt <= attempts; attempt++) {
      ctx.token.throwIfCancelled();
      const response = await ctx.token.race(
        this.options.llm.invokeStructured(messages, node.outputSchema.jsonSchema, callOptions),
      );
      metrics.recordUsage(response.usage);

      const result = node.outputSchema.validate(response.data);
      if (result.ok) {
        const delta = Object.fromEntries(
          Object.entries(result.value).filter(([key]) => node.outputs.includes(key)),
        );
        return { nodeId: node.id, delta, metrics: metrics.finish(attempt - 1) };
      }

      issues = result.issues;
      this.logger.debug(`Node ${node.id}: invalid structured output (attempt ${attempt}/${attempts}): ${issues.join('; ')}`);
      messages.push(
        { role: 'assistant', content: renderToolOutput(response.data) },
        { role: 'user', content: buildCorrectionPrompt(node, issues) },
      );
    }

    throw new OutputValidationError(node.id, attempts, issues);
  }

  private async runToolLoop(
    node: NodeDescriptor,
    messages: ChatMessage[],
    metrics: MetricsRecorder,
    callOptions: LlmCallOptions,
    token: CancellationToken,
  ): Promise<void> {
    const invoker = this.options.tools;
    if (!invoker) {
      throw new ToolExecutionError(`Node "${node.id}" declares tools but no tool invoker is configured`, node.tools[0].name);
    }
    const specs: ToolSpec[] = node.tools.map(
      (binding) =>
        invoker.spec(binding.name) ?? {
          name: binding.name,
          description: '',
          parameters: { type: 'object', properties: {} },
        },
    );

    for (let round = 1; round <= node.maxToolIterations; round++) {
      token.throwIfCancelled();
      const response = await token.race(this.options.llm.invokeWithTools(messages, specs, callOptions));
      metrics.recordUsage(response.usage);
      messages.push({
        role: 'assistant',
        content: response.content,
        ...(response.toolCalls.length > 0 ? { toolCalls: response.toolCalls } : {}),
      });
      if (response.toolCalls.length === 0) return;

      for (const call of response.toolCalls) {
        const content = await this.callTool(node, invoker, call, metrics, token);
        messages.push({ role: 'tool', toolCallId: call.id, content });
      }
    }
    this.logger.warn(`Node ${node.id}: tool loop stopped after ${node.maxToolIterations} rounds`);
  }

  /** Returns the observation fed back to the model. */
  private async callTool(
    node: NodeDescriptor,
    invoker: ToolInvoker,
    call: ToolCall,
    metrics: MetricsRecorder,
    token: CancellationToken,
  ): Promise<string> {
    const binding = node.tools.find((t) => t.name === call.name);
    if (!binding) {
      return `Error: tool "${call.name}" is not available to this node`;
    }

    metrics.toolCalls++;
    const outcome = await token.race(invoker.invoke(call.name, call.arguments, token.signal));
    if (outcome.ok) return renderToolOutput(outcome.output);

    if (binding.onError === 'fail') throw outcome.error;
    this.logger.debug(`Node ${node.id}: ${outcome.error.message}`);
    return `Error: ${outcome.error.message}`;
  }
}
