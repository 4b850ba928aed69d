// packages/core/src/types/llm.ts

import type { LlmProvider } from './config.js';

export type ChatRole = 'system' | 'user' | 'assistant' | 'tool';

export interface ToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export interface ChatMessage {
  role: ChatRole;
  content: string;
  /** Set on `tool` messages: the call this message answers. */
  toolCallId?: string;
  /** Set on `assistant` messages that requested tools. */
  toolCalls?: ToolCall[];
}

/** JSON Schema object describing tool parameters or a structured output. */
export type JsonSchema = { [key: string]: unknown };

export interface ToolSpec {
  name: string;
  description: string;
  parameters: JsonSchema;
}

/** Effective model settings for one node (node override merged over globals). */
export interface LlmSettings {
  provider: LlmProvider;
  model: string;
  temperature: number;
  maxTokens?: number;
  apiBase?: string;
}

export interface LlmUsage {
  inputTokens: number;
  outputTokens: number;
  /** Cost reported by the provider; estimated from the pricing table when absent. */
  costUsd?: number;
}

export interface ToolCallingResponse {
  content: string;
  toolCalls: ToolCall[];
  usage: LlmUsage;
}

export interface StructuredResponse {
  data: unknown;
  usage: LlmUsage;
}

/** Everything a client receives besides the conversation itself. */
export interface LlmCallOptions {
  settings: LlmSettings;
  /** Fires when the run is cancelled or times out; clients may abort early. */
  signal?: AbortSignal;
}

export interface LlmClient {
  invokeWithTools(
    messages: ChatMessage[],
    tools: ToolSpec[],
    options: LlmCallOptions,
  ): Promise<ToolCallingResponse>;
  invokeStructured(
    messages: ChatMessage[],
    schema: JsonSchema,
    options: LlmCallOptions,
  ): Promise<StructuredResponse>;
}
