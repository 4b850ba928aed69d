// packages/core/src/tools/registry.ts — Immutable name → tool lookup

import type { ToolInvoker, ToolOutcome } from '../types/collaborators.js';
import type { JsonSchema, ToolSpec } from '../types/llm.js';
import { ToolExecutionError } from '../utils/errors.js';

export interface ToolDefinition {
  name: string;
  description: string;
  parameters?: JsonSchema;
  invoke(args: Record<string, unknown>, signal?: AbortSignal): Promise<unknown> | unknown;
}

const EMPTY_PARAMETERS: JsonSchema = { type: 'object', properties: {} };

/**
 * Tools registered once at startup. The registry never changes afterwards,
 * so one instance can back any number of concurrent runs.
 */
export class ToolRegistry implements ToolInvoker {
  private readonly tools: ReadonlyMap<string, ToolDefinition>;

  constructor(definitions: readonly ToolDefinition[] = []) {
    const tools = new Map<string, ToolDefinition>();
    for (const def of definitions) {
      if (tools.has(def.name)) {
        throw new Error(`Tool "${def.name}" is registered twice`);
      }
      tools.set(def.name, def);
    }
    this.tools = tools;
  }

  get names(): string[] {
    return [...this.tools.keys()];
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  spec(name: string): ToolSpec | undefined {
    const def = this.tools.get(name);
    if (!def) return undefined;
    return { name: def.name, description: def.description, parameters: def.parameters ?? EMPTY_PARAMETERS };
  }

  async invoke(
    name: string,
    args: Record<string, unknown>,
    signal?: AbortSignal,
  ): Promise<ToolOutcome> {
    const def = this.tools.get(name);
    if (!def) {
      return { ok: false, error: new ToolExecutionError(`Unknown tool "${name}"`, name) };
    }
    try {
      return { ok: true, output: await def.invoke(args, signal) };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return { ok: false, error: new ToolExecutionError(`Tool "${name}" failed: ${message}`, name) };
    }
  }
}
