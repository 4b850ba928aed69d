// packages/cli/tests/commands.test.ts

import {
  type ChatMessage,
  ConfigValidationError,
  type LlmClient,
  type StructuredResponse,
  type ToolCallingResponse,
} from '@cogflow/core';
import chalk from 'chalk';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { type MockInstance, afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { planCommand } from '../src/commands/plan.js';
import { executeRun } from '../src/commands/run.js';
import { runsCommand } from '../src/commands/runs.js';
import { validateCommand } from '../src/commands/validate.js';

const examplesDir = join(dirname(fileURLToPath(import.meta.url)), '../../../examples');
const example = (name: string): string => join(examplesDir, name);

const USAGE = { inputTokens: 4, outputTokens: 2, costUsd: 0 };

/** Answers the pros-cons workflow by looking at each node's prompt. */
class DebateLlm implements LlmClient {
  readonly prompts: string[] = [];

  async invokeStructured(messages: ChatMessage[]): Promise<StructuredResponse> {
    const prompt = messages[0]?.content ?? '';
    this.prompts.push(prompt);
    if (prompt.startsWith('List the strongest arguments for')) {
      return { data: { pros: 'fast', sources: ['a'] }, usage: USAGE };
    }
    if (prompt.startsWith('List the strongest arguments against')) {
      return { data: { cons: 'costly', sources: ['b'] }, usage: USAGE };
    }
    return { data: { verdict: 'go' }, usage: USAGE };
  }

  async invokeWithTools(): Promise<ToolCallingResponse> {
    throw new Error('pros-cons declares no tools');
  }
}

function printed(spy: MockInstance<typeof console.log>): string[] {
  return spy.mock.calls.map((call) => String(call[0]));
}

describe('CLI commands', () => {
  let dir: string;
  let log: MockInstance<typeof console.log>;
  let error: MockInstance<typeof console.error>;

  beforeEach(() => {
    chalk.level = 0;
    dir = mkdtempSync(join(tmpdir(), 'cogflow-cli-'));
    vi.stubEnv('COGFLOW_LOG_LEVEL', 'silent');
    log = vi.spyOn(console, 'log').mockImplementation(() => {});
    error = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    process.exitCode = undefined;
    rmSync(dir, { recursive: true, force: true });
  });

  describe('validate', () => {
    it('reports a valid document with its counts', async () => {
      await validateCommand(example('pros-cons.yaml'), {});
      expect(printed(log)).toEqual(['✓ pros-cons is valid (3 nodes, 4 edges, 5 state fields)']);
      expect(process.exitCode).toBeUndefined();
    });

    it('lists every issue and sets a failing exit code', async () => {
      const file = join(dir, 'broken.yaml');
      writeFileSync(
        file,
        [
          'flow: { name: broken }',
          'state:',
          '  fields:',
          '    - { name: topic, type: str }',
          'nodes:',
          '  - { id: draft, prompt: "Write about {state.topic}", outputs: [topic] }',
          'edges:',
          '  - { from: START, to: draft }',
          '  - { from: draft, to: ENDD }',
        ].join('\n'),
      );

      await validateCommand(file, {});

      expect(process.exitCode).toBe(1);
      const lines = printed(error);
      expect(lines[0]).toMatch(new RegExp(`^✗ ${file.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')}: \\d+ issues?$`));
      expect(lines).toContain(
        `  ✗ edges.1: Edge from "draft" references unknown node "ENDD" (did you mean 'END'?)`,
      );
    });

    it('prints the issues as JSON', async () => {
      const file = join(dir, 'empty.yaml');
      writeFileSync(file, 'flow: { name: empty }\n');

      await validateCommand(file, { json: true });

      expect(process.exitCode).toBe(1);
      const body = JSON.parse(printed(log)[0]) as { valid: boolean; issues: unknown[] };
      expect(body.valid).toBe(false);
      expect(body.issues.length).toBeGreaterThan(0);
    });
  });

  describe('plan', () => {
    it('prints the compiled plan as JSON', async () => {
      await planCommand(example('pros-cons.yaml'), { json: true });

      const plan = JSON.parse(printed(log)[0]) as { workflow: string; edges: { kind: string }[] };
      expect(plan.workflow).toBe('pros-cons');
      expect(plan.edges.map((e) => e.kind)).toEqual(['fork', 'linear', 'linear', 'linear']);
    });

    it('reports a missing file', async () => {
      await planCommand(join(dir, 'missing.yaml'), {});
      expect(process.exitCode).toBe(1);
      expect(printed(error)[0]).toMatch(/^Error: /);
    });
  });

  describe('run and runs', () => {
    it('executes a workflow, records it and lists it afterwards', async () => {
      const db = join(dir, 'runs.db');
      const llm = new DebateLlm();

      const code = await executeRun(
        example('pros-cons.yaml'),
        { input: ['question=Ship on Friday?'], db, llmCommand: 'unused', json: true },
        llm,
      );

      expect(code).toBe(0);
      expect(llm.prompts).toHaveLength(3);
      const outcome = JSON.parse(printed(log)[0]) as {
        runId: string;
        status: string;
        state: Record<string, unknown>;
      };
      expect(outcome.status).toBe('completed');
      expect(outcome.state).toEqual({
        question: 'Ship on Friday?',
        pros: 'fast',
        cons: 'costly',
        sources: ['a', 'b'],
        verdict: 'go',
      });

      log.mockClear();
      await runsCommand(undefined, { limit: 20, db });
      const rows = printed(log);
      expect(rows).toHaveLength(1);
      expect(rows[0].startsWith(`${outcome.runId}  completed  pros-cons  `)).toBe(true);
      expect(rows[0].endsWith('  $0.0000')).toBe(true);

      log.mockClear();
      await runsCommand(outcome.runId, { limit: 20, db });
      const stored = JSON.parse(printed(log)[0]) as { id: string; status: string };
      expect(stored).toMatchObject({ id: outcome.runId, status: 'completed' });
    });

    it('fails the run on a missing required input before calling the model', async () => {
      const llm = new DebateLlm();
      const code = await executeRun(
        example('pros-cons.yaml'),
        { llmCommand: 'unused', persist: false, json: true },
        llm,
      );

      expect(code).toBe(2);
      expect(llm.prompts).toEqual([]);
      const outcome = JSON.parse(printed(log)[0]) as { status: string; error: { type: string; message: string } };
      expect(outcome.status).toBe('failed');
      expect(outcome.error).toMatchObject({ type: 'StateError', message: 'Missing required input "question"' });
    });

    it('refuses a workflow that declares a tool the command line does not offer', async () => {
      const file = join(dir, 'search.yaml');
      writeFileSync(
        file,
        [
          'flow: { name: search }',
          'state:',
          '  fields:',
          '    - { name: question, type: str, required: true }',
          '    - { name: answer, type: str }',
          'nodes:',
          '  - { id: lookup, prompt: "Answer {state.question}", outputs: [answer], tools: [web_search] }',
          'edges:',
          '  - { from: START, to: lookup }',
          '  - { from: lookup, to: END }',
        ].join('\n'),
      );
      const llm = new DebateLlm();

      const run = executeRun(file, { input: ['question=q'], llmCommand: 'unused', persist: false, json: true }, llm);

      await expect(run).rejects.toBeInstanceOf(ConfigValidationError);
      await expect(run).rejects.toThrow('nodes.0.tools.0: Node "lookup" uses unregistered tool "web_search"');
      expect(llm.prompts).toEqual([]);
    });

    it('reports an unknown run id', async () => {
      await runsCommand('run_missing', { limit: 20, db: join(dir, 'runs.db') });
      expect(process.exitCode).toBe(1);
      expect(printed(error)).toEqual(['Run not found: run_missing']);
    });
  });
});
