// packages/core/src/models/command-client.ts — LLM client backed by a CLI subprocess

import { spawn } from 'node:child_process';
import { z } from 'zod';
import type {
  ChatMessage,
  JsonSchema,
  LlmCallOptions,
  LlmClient,
  LlmUsage,
  StructuredResponse,
  ToolCall,
  ToolCallingResponse,
  ToolSpec,
} from '../types/llm.js';
import { DEFAULT_MODEL_TIMEOUT_SEC } from '../utils/constants.js';
import { ModelError } from '../utils/errors.js';
import { generateId } from '../utils/id.js';
import { type Logger, silentLogger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';

const MAX_OUTPUT_BYTES = 512 * 1024;

// Always passed through to the subprocess, plus provider keys.
const BASE_ENV_ALLOWLIST = [
  'PATH',
  'HOME',
  'TEMP',
  'TMP',
  'USERPROFILE',
  'SystemRoot',
  'SHELL',
  'OPENAI_API_KEY',
  'ANTHROPIC_API_KEY',
  'GOOGLE_API_KEY',
];

export interface CommandLlmClientOptions {
  /** Executable plus fixed arguments, e.g. `codex exec`. */
  command: string;
  timeoutMs?: number;
  cwd?: string;
  envAllowlist?: string[];
  /** Attempts per call, spawn failures and non-zero exits included. */
  attempts?: number;
  logger?: Logger;
}

const toolReplySchema = z.object({
  content: z.string().default(''),
  tool_calls: z
    .array(
      z.object({
        id: z.string().optional(),
        name: z.string().min(1),
        arguments: z.record(z.unknown()).default({}),
      }),
    )
    .default([]),
});

/**
 * Talks to any command that reads a prompt on stdin and answers on stdout.
 * Tool calls and structured outputs are exchanged as JSON in the reply text.
 */
export class CommandLlmClient implements LlmClient {
  private readonly command: string;
  private readonly args: string[];
  private readonly logger: Logger;

  constructor(private readonly options: CommandLlmClientOptions) {
    const [command, ...args] = splitCommand(options.command);
    if (!command) throw new ModelError('LLM command is empty');
    this.command = command;
    this.args = args;
    this.logger = options.logger ?? silentLogger;
  }

  async invokeWithTools(
    messages: ChatMessage[],
    tools: ToolSpec[],
    options: LlmCallOptions,
  ): Promise<ToolCallingResponse> {
    const prompt = buildToolPrompt(messages, tools);
    const { text, usage } = await this.exchange(prompt, options);
    return { ...parseToolReply(text), usage };
  }

  async invokeStructured(
    messages: ChatMessage[],
    schema: JsonSchema,
    options: LlmCallOptions,
  ): Promise<StructuredResponse> {
    const prompt = buildStructuredPrompt(messages, schema);
    const { text, usage } = await this.exchange(prompt, options);
    return { data: extractJson(text), usage };
  }

  private async exchange(
    prompt: string,
    options: LlmCallOptions,
  ): Promise<{ text: string; usage: LlmUsage }> {
    const env = buildFilteredEnv([...BASE_ENV_ALLOWLIST, ...(this.options.envAllowlist ?? [])]);
    const text = await withRetry(
      () =>
        runCommand(this.command, this.args, prompt, {
          env,
          cwd: this.options.cwd,
          timeoutMs: this.options.timeoutMs ?? DEFAULT_MODEL_TIMEOUT_SEC * 1000,
          signal: options.signal,
          model: options.settings.model,
        }),
      {
        attempts: this.options.attempts ?? 2,
        backoff: 500,
        retryOn: () => !options.signal?.aborted,
        signal: options.signal,
        onRetry: (error, attempt) =>
          this.logger.warn(
            `LLM command failed (attempt ${attempt}): ${error instanceof Error ? error.message : String(error)}`,
          ),
      },
    );
    return { text, usage: estimateTokenUsage(prompt, text) };
  }
}

export function splitCommand(command: string): string[] {
  return command.trim().split(/\s+/).filter(Boolean);
}

export function buildFilteredEnv(allowlist: string[]): Record<string, string> {
  const env: Record<string, string> = {};
  for (const key of allowlist) {
    const val = process.env[key];
    if (val !== undefined) env[key] = val;
  }
  return env;
}

/** Estimate tokens using a chars/4 heuristic. Subscription CLIs report no cost. */
export function estimateTokenUsage(prompt: string, output: string): LlmUsage {
  return {
    inputTokens: Math.ceil(prompt.length / 4),
    outputTokens: Math.ceil(output.length / 4),
    costUsd: 0,
  };
}

export function renderConversation(messages: ChatMessage[]): string {
  return messages
    .map((m) => {
      if (m.role === 'tool') return `[tool result ${m.toolCallId ?? ''}]\n${m.content}`;
      if (m.toolCalls && m.toolCalls.length > 0) {
        const calls = m.toolCalls.map((c) => `${c.name}(${JSON.stringify(c.arguments)})`).join(', ');
        return `[${m.role}]\n${m.content}\n[requested tools] ${calls}`;
      }
      return `[${m.role}]\n${m.content}`;
    })
    .join('\n\n');
}

export function buildToolPrompt(messages: ChatMessage[], tools: ToolSpec[]): string {
  const toolList = tools
    .map((t) => `- ${t.name}: ${t.description}\n  parameters: ${JSON.stringify(t.parameters)}`)
    .join('\n');
  return [
    renderConversation(messages),
    'You may call these tools:',
    toolList,
    'Reply with only a JSON object: {"content": string, "tool_calls": [{"name": string, "arguments": object}]}.',
    'Use an empty tool_calls list once you need no more tool results.',
  ].join('\n\n');
}

export function buildStructuredPrompt(messages: ChatMessage[], schema: JsonSchema): string {
  return [
    renderConversation(messages),
    `Reply with only a JSON object matching this JSON Schema:\n${JSON.stringify(schema, null, 2)}`,
  ].join('\n\n');
}

/**
 * Pull a JSON value out of model text: the whole reply, a fenced block,
 * or the outermost braces. Undefined when nothing parses.
 */
export function extractJson(text: string): unknown {
  const candidates = [text.trim()];
  const fenced = /```(?:json)?\s*([\s\S]*?)```/.exec(text);
  if (fenced) candidates.push(fenced[1].trim());
  const first = text.indexOf('{');
  const last = text.lastIndexOf('}');
  if (first !== -1 && last > first) candidates.push(text.slice(first, last + 1));

  for (const candidate of candidates) {
    try {
      const value: unknown = JSON.parse(candidate);
      return value;
    } catch {
      // try the next candidate
    }
  }
  return undefined;
}

export function parseToolReply(text: string): { content: string; toolCalls: ToolCall[] } {
  const parsed = toolReplySchema.safeParse(extractJson(text));
  if (!parsed.success) return { content: text.trim(), toolCalls: [] };
  return {
    content: parsed.data.content,
    toolCalls: parsed.data.tool_calls.map((call) => ({
      id: call.id ?? generateId('call'),
      name: call.name,
      arguments: call.arguments,
    })),
  };
}

export function runCommand(
  command: string,
  args: string[],
  input: string,
  options: {
    env: Record<string, string>;
    timeoutMs: number;
    cwd?: string;
    signal?: AbortSignal;
    model?: string;
  },
): Promise<string> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env,
      stdio: ['pipe', 'pipe', 'pipe'],
      windowsHide: true,
      signal: options.signal,
    });

    let stdout = '';
    let stderr = '';
    let stdoutBytes = 0;
    let settled = false;

    const fail = (err: ModelError) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      reject(err);
    };

    const timer = setTimeout(() => {
      child.kill('SIGTERM');
      fail(new ModelError(`LLM command timed out after ${options.timeoutMs}ms`, 'command', options.model));
    }, options.timeoutMs);

    child.stdout.on('data', (data: Buffer) => {
      stdoutBytes += data.byteLength;
      if (stdoutBytes <= MAX_OUTPUT_BYTES) stdout += data.toString();
    });
    child.stderr.on('data', (data: Buffer) => {
      if (stderr.length < 10_000) stderr += data.toString();
    });

    child.on('error', (err) => {
      fail(new ModelError(`LLM command failed: ${err.message}`, 'command', options.model));
    });

    child.on('close', (code) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      if (code !== 0) {
        reject(
          new ModelError(
            `LLM command exited with code ${code}: ${stderr.slice(0, 500)}`,
            'command',
            options.model,
            code ?? undefined,
          ),
        );
        return;
      }
      resolve(stdout);
    });

    child.stdin.end(input);
  });
}
