// packages/core/src/state/values.ts

import { z } from 'zod';

/** Any value a state field can hold. JSON-shaped so it survives persistence. */
export type StateValue =
  | string
  | number
  | boolean
  | null
  | StateValue[]
  | { [key: string]: StateValue };

export const stateValueSchema: z.ZodType<StateValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(stateValueSchema),
    z.record(stateValueSchema),
  ]),
);

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Render a value for prompt interpolation. */
export function renderValue(value: StateValue | undefined): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}
