import { describe, expect, it } from 'vitest';
import { validateWorkflow } from '../../../src/config/validator.js';
import type { WorkflowConfigInput } from '../../../src/config/schema.js';
import { CancellationError, CancellationToken } from '../../../src/engine/cancellation.js';
import { compileWorkflow } from '../../../src/engine/graph-compiler.js';
import { NodeExecutor } from '../../../src/engine/node-executor.js';
import { ToolRegistry } from '../../../src/tools/registry.js';
import type { ExecutionPlan, NodeDescriptor } from '../../../src/types/plan.js';
import { OutputValidationError, TemplateError, ToolExecutionError } from '../../../src/utils/errors.js';
import { ScriptedLlmClient, type ToolReply, inSequence } from '../../helpers/scripted-llm.js';

function researchWorkflow(tools: WorkflowConfigInput['nodes'][number]['tools'] = ['search']): WorkflowConfigInput {
  return {
    flow: { name: 'research' },
    state: {
      fields: [
        { name: 'question', type: 'str', required: true },
        { name: 'answer', type: 'str' },
        { name: 'confidence', type: 'float' },
      ],
    },
    nodes: [
      {
        id: 'research',
        prompt: 'Answer: {state.question}',
        outputs: ['answer', 'confidence'],
        tools,
      },
    ],
    edges: [
      { from: 'START', to: 'research' },
      { from: 'research', to: 'END' },
    ],
    config: { execution: { max_retries: 1, max_tool_iterations: 2 } },
  };
}

const searchTool = {
  name: 'search',
  description: 'Search the web',
  parameters: { type: 'object', properties: { q: { type: 'string' } } },
  invoke: (args: Record<string, unknown>) => ({ hits: [`result for ${String(args.q)}`] }),
};

function setup(input: WorkflowConfigInput, registry = new ToolRegistry([searchTool])) {
  const plan: ExecutionPlan = compileWorkflow(validateWorkflow(input, { tools: registry }));
  const node = plan.nodes.get('research');
  if (!node) throw new Error('missing node');
  const snapshot = plan.stateType.initialize({ question: 'Why is the sky blue?' });
  const ctx = { token: new CancellationToken(), stateFields: plan.stateType.fieldNames };
  return { plan, node, snapshot, ctx, registry };
}

function run(llm: ScriptedLlmClient, node: NodeDescriptor, s: ReturnType<typeof setup>) {
  return new NodeExecutor({ llm, tools: s.registry }).execute(node, s.snapshot, s.ctx);
}

describe('NodeExecutor', () => {
  it('returns a delta restricted to the node outputs', async () => {
    const s = setup(researchWorkflow([]));
    const llm = new ScriptedLlmClient({
      structured: () => ({ answer: 'Rayleigh scattering', confidence: 0.9 }),
    });
    const result = await run(llm, s.node, s);

    expect(result.delta).toEqual({ answer: 'Rayleigh scattering', confidence: 0.9 });
    expect(result.metrics).toMatchObject({ llmCalls: 1, inputTokens: 10, outputTokens: 5, totalTokens: 15, retries: 0 });
    expect(llm.structuredCalls[0].prompt).toBe('Answer: Why is the sky blue?');
    expect(llm.toolCalls).toHaveLength(0);
  });

  it('hands the model the output JSON schema and node settings', async () => {
    const s = setup(researchWorkflow([]));
    const llm = new ScriptedLlmClient({ structured: () => ({ answer: 'a', confidence: 1 }) });
    await run(llm, s.node, s);
    const [call] = llm.structuredCalls;
    expect(call.schema.required).toEqual(['answer', 'confidence']);
    expect(call.options.settings.model).toBe('gpt-4o-mini');
    expect(call.options.signal).toBe(s.ctx.token.signal);
  });

  it('runs the tool loop before extracting structured output', async () => {
    const s = setup(researchWorkflow());
    const llm = new ScriptedLlmClient({
      tools: inSequence<ToolReply>(
        { toolCalls: [{ id: 'c1', name: 'search', arguments: { q: 'sky' } }] },
        { content: 'I have enough' },
      ),
      structured: () => ({ answer: 'scattering', confidence: 0.8 }),
    });
    const result = await run(llm, s.node, s);

    expect(result.metrics).toMatchObject({ llmCalls: 3, toolCalls: 1 });
    const second = llm.toolCalls[1].messages;
    expect(second[second.length - 1]).toEqual({
      role: 'tool',
      toolCallId: 'c1',
      content: '{"hits":["result for sky"]}',
    });
    expect(llm.toolCalls[0].tools.map((t) => t.name)).toEqual(['search']);
  });

  it('feeds tool failures back to the model by default', async () => {
    const failing = new ToolRegistry([{ ...searchTool, invoke: () => Promise.reject(new Error('rate limited')) }]);
    const s = setup(researchWorkflow(), failing);
    const llm = new ScriptedLlmClient({
      tools: inSequence<ToolReply>({ toolCalls: [{ id: 'c1', name: 'search', arguments: {} }] }, {}),
      structured: () => ({ answer: 'unknown', confidence: 0 }),
    });
    await run(llm, s.node, s);
    const messages = llm.toolCalls[1].messages;
    expect(messages[messages.length - 1].content).toBe('Error: Tool "search" failed: rate limited');
  });

  it('fails the node when a tool marked on_error: fail fails', async () => {
    const failing = new ToolRegistry([{ ...searchTool, invoke: () => Promise.reject(new Error('down')) }]);
    const s = setup(researchWorkflow([{ name: 'search', on_error: 'fail' }]), failing);
    const llm = new ScriptedLlmClient({
      tools: () => ({ toolCalls: [{ id: 'c1', name: 'search', arguments: {} }] }),
    });
    await expect(run(llm, s.node, s)).rejects.toThrow(ToolExecutionError);
  });

  it('refuses tools the node did not declare', async () => {
    const s = setup(researchWorkflow());
    const llm = new ScriptedLlmClient({
      tools: inSequence<ToolReply>({ toolCalls: [{ id: 'c1', name: 'delete_everything', arguments: {} }] }, {}),
      structured: () => ({ answer: 'a', confidence: 1 }),
    });
    const result = await run(llm, s.node, s);
    const messages = llm.toolCalls[1].messages;
    expect(messages[messages.length - 1].content).toBe('Error: tool "delete_everything" is not available to this node');
    expect(result.metrics.toolCalls).toBe(0);
  });

  it('stops the tool loop at max_tool_iterations', async () => {
    const s = setup(researchWorkflow());
    const llm = new ScriptedLlmClient({
      tools: () => ({ toolCalls: [{ id: 'c', name: 'search', arguments: { q: 'again' } }] }),
      structured: () => ({ answer: 'a', confidence: 1 }),
    });
    const result = await run(llm, s.node, s);
    expect(llm.toolCalls).toHaveLength(2);
    expect(result.metrics.toolCalls).toBe(2);
  });

  it('retries invalid structured output with a correction prompt', async () => {
    const s = setup(researchWorkflow([]));
    const llm = new ScriptedLlmClient({
      structured: inSequence<unknown>({ answer: 'a', confidence: 'high' }, { answer: 'a', confidence: 0.6 }),
    });
    const result = await run(llm, s.node, s);

    expect(result.delta).toEqual({ answer: 'a', confidence: 0.6 });
    expect(result.metrics.retries).toBe(1);
    const retry = llm.structuredCalls[1].messages;
    expect(retry[retry.length - 1].content).toBe(
      [
        'Your previous reply did not match the required output format.',
        'Problems: confidence: Expected number, received string',
        'Reply again with a JSON object containing exactly these fields: answer: str, confidence: float.',
      ].join('\n'),
    );
  });

  it('raises OutputValidationError once retries are exhausted', async () => {
    const s = setup(researchWorkflow([]));
    const llm = new ScriptedLlmClient({ structured: () => ({ answer: 42 }) });
    const failure = run(llm, s.node, s);
    await expect(failure).rejects.toThrow(OutputValidationError);
    await expect(failure).rejects.toThrow(
      "Node 'research' produced invalid output after 2 attempt(s): answer: Expected string, received number; confidence: Required",
    );
    expect(llm.structuredCalls).toHaveLength(2);
  });

  it('raises TemplateError before calling the model', async () => {
    const s = setup(researchWorkflow([]));
    const llm = new ScriptedLlmClient({ structured: () => ({}) });
    const node = { ...s.node, prompt: 'Answer {state.questoin}' };
    await expect(run(llm, node, s)).rejects.toThrow(TemplateError);
    expect(llm.callCount).toBe(0);
  });

  it('resolves node inputs before the prompt', async () => {
    const s = setup(researchWorkflow([]));
    const llm = new ScriptedLlmClient({ structured: () => ({ answer: 'a', confidence: 1 }) });
    const node = { ...s.node, prompt: 'Q: {q} ({state.question})', inputs: { q: 'Briefly, {question}' } };
    await run(llm, node, s);
    expect(llm.structuredCalls[0].prompt).toBe('Q: Briefly, Why is the sky blue? (Why is the sky blue?)');
  });

  it('names the input mapping that cannot be resolved', async () => {
    const s = setup(researchWorkflow([]));
    const llm = new ScriptedLlmClient({ structured: () => ({}) });
    const node = { ...s.node, prompt: '{q}', inputs: { q: '{question.text}' } };
    await expect(run(llm, node, s)).rejects.toThrow(
      'Input "q" could not be resolved: Prompt placeholder {question.text} has no value at "question.text".',
    );
    expect(llm.callCount).toBe(0);
  });

  it('stops when the token is cancelled mid-call', async () => {
    const s = setup(researchWorkflow([]));
    const llm = new ScriptedLlmClient({
      structured: () => {
        s.ctx.token.cancel('deadline');
        return new Promise(() => undefined);
      },
    });
    await expect(run(llm, s.node, s)).rejects.toBeInstanceOf(CancellationError);
  });
});
