// packages/core/src/template/resolver.ts — Prompt placeholder substitution

import { suggestName } from '../config/suggest.js';
import { resolvePath } from '../expressions/evaluate.js';
import type { StateSnapshot } from '../state/state-record.js';
import { type StateValue, renderValue } from '../state/values.js';
import { TemplateError } from '../utils/errors.js';

/** Matches `{state.field}`, the short form `{field}`, and dotted paths such as `{meta.author}`. */
const PLACEHOLDER = /\{(state\.)?([A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z_][A-Za-z0-9_]*)*)\}/g;

export interface Placeholder {
  /** Text as written, braces included. */
  raw: string;
  /** First path segment. */
  field: string;
  path: string[];
  /** Written with the `state.` prefix, so never a node input. */
  stateOnly: boolean;
  offset: number;
}

export type ResolvedInputs = Readonly<Record<string, StateValue>>;

export function findPlaceholders(template: string): Placeholder[] {
  return [...template.matchAll(PLACEHOLDER)].map((match) => {
    const path = match[2].split('.');
    return {
      raw: match[0],
      field: path[0],
      path,
      stateOnly: match[1] !== undefined,
      offset: match.index ?? 0,
    };
  });
}

function lookup(
  placeholder: Placeholder,
  snapshot: StateSnapshot,
  fieldNames: readonly string[],
  inputs: ResolvedInputs,
): StateValue | undefined {
  const { raw, field, path, stateOnly } = placeholder;
  let source: StateSnapshot;
  if (!stateOnly && Object.hasOwn(inputs, field)) {
    source = inputs;
  } else if (fieldNames.includes(field)) {
    source = snapshot;
  } else {
    const candidates = stateOnly ? fieldNames : [...fieldNames, ...Object.keys(inputs)];
    throw new TemplateError(
      `Prompt references unknown state field "${field}".`,
      field,
      suggestName(field, candidates),
    );
  }

  const value = resolvePath(source, path);
  if (value === undefined && path.length > 1) {
    throw new TemplateError(`Prompt placeholder ${raw} has no value at "${path.join('.')}".`, field);
  }
  return value;
}

/**
 * Substitute placeholders with rendered values. Short-form placeholders look
 * in `inputs` first, then state; `{state.x}` always reads state.
 * `fieldNames` is the declared schema; a placeholder outside it is a TemplateError
 * even when the snapshot happens to carry the key.
 */
export function resolveTemplate(
  template: string,
  snapshot: StateSnapshot,
  fieldNames: readonly string[] = Object.keys(snapshot),
  inputs: ResolvedInputs = {},
): string {
  const placeholders = findPlaceholders(template);
  if (placeholders.length === 0) return template;

  let out = '';
  let cursor = 0;
  for (const placeholder of placeholders) {
    out += template.slice(cursor, placeholder.offset);
    out += renderValue(lookup(placeholder, snapshot, fieldNames, inputs));
    cursor = placeholder.offset + placeholder.raw.length;
  }
  return out + template.slice(cursor);
}

/**
 * Resolve a node's input mappings against state. A mapping that is a single
 * placeholder keeps the raw value, so prompts can reach into it with a dotted
 * path; anything else renders to text.
 */
export function resolveInputs(
  mappings: Readonly<Record<string, string>>,
  snapshot: StateSnapshot,
  fieldNames: readonly string[] = Object.keys(snapshot),
): Record<string, StateValue> {
  const resolved: Record<string, StateValue> = {};
  for (const [name, template] of Object.entries(mappings)) {
    try {
      const placeholders = findPlaceholders(template);
      const whole = placeholders.length === 1 && placeholders[0].raw === template;
      resolved[name] = whole
        ? (lookup(placeholders[0], snapshot, fieldNames, {}) ?? null)
        : resolveTemplate(template, snapshot, fieldNames);
    } catch (err) {
      if (!(err instanceof TemplateError)) throw err;
      throw new TemplateError(`Input "${name}" could not be resolved: ${err.message}`, err.field);
    }
  }
  return resolved;
}
