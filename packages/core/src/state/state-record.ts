// packages/core/src/state/state-record.ts — Per-workflow state record type

import type { StateFieldConfig } from '../types/config.js';
import { StateError } from '../utils/errors.js';
import {
  type FieldType,
  type MergePolicy,
  formatFieldType,
  matchesFieldType,
  mergePolicyFor,
  parseFieldType,
} from './field-types.js';
import { type StateValue, stateValueSchema } from './values.js';

export interface StateFieldSpec {
  readonly name: string;
  /** Position in the declared field list. */
  readonly index: number;
  readonly type: FieldType;
  readonly policy: MergePolicy;
  readonly required: boolean;
  readonly defaultValue: StateValue;
  readonly description?: string;
}

export type StateSnapshot = Readonly<Record<string, StateValue>>;
export type StateDelta = Readonly<Record<string, StateValue>>;

function cloneValue(value: StateValue): StateValue {
  return structuredClone(value);
}

/**
 * Runtime record type built from a workflow's state field list.
 * Snapshots are frozen plain objects; they change only through `merge`.
 */
export class StateRecordType {
  private readonly byName: ReadonlyMap<string, StateFieldSpec>;

  constructor(public readonly fields: readonly StateFieldSpec[]) {
    this.byName = new Map(fields.map((f) => [f.name, f]));
  }

  get fieldNames(): string[] {
    return this.fields.map((f) => f.name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  field(name: string): StateFieldSpec | undefined {
    return this.byName.get(name);
  }

  /** Typed read of a single field. */
  get(snapshot: StateSnapshot, name: string): StateValue {
    if (!this.byName.has(name)) {
      throw new StateError(`Unknown state field "${name}"`, name);
    }
    return snapshot[name] ?? null;
  }

  /**
   * Build the initial snapshot from caller inputs plus declared defaults.
   * Unknown keys, missing required fields and ill-typed values are rejected.
   */
  initialize(inputs: Record<string, unknown>): StateSnapshot {
    const unknown = Object.keys(inputs).filter((key) => !this.byName.has(key));
    if (unknown.length > 0) {
      throw new StateError(
        `Unknown input field(s): ${unknown.join(', ')}. Declared fields: ${this.fieldNames.join(', ')}`,
        unknown[0],
      );
    }

    const state: Record<string, StateValue> = {};
    for (const field of this.fields) {
      const raw = inputs[field.name];
      if (raw === undefined || raw === null) {
        if (field.required) {
          throw new StateError(`Missing required input "${field.name}"`, field.name);
        }
        state[field.name] = cloneValue(field.defaultValue);
        continue;
      }
      state[field.name] = this.checkValue(field, raw);
    }
    return Object.freeze(state);
  }

  /**
   * Apply a delta to a snapshot using each field's merge policy.
   * Scalars are overwritten; lists are concatenated after the base value.
   */
  merge(base: StateSnapshot, delta: StateDelta): StateSnapshot {
    const next: Record<string, StateValue> = { ...base };
    for (const [name, value] of Object.entries(delta)) {
      const field = this.requireField(name);
      if (value === null) {
        if (field.policy === 'last-writer-wins') next[name] = null;
        continue;
      }
      const checked = this.checkValue(field, value);
      if (field.policy === 'concat') {
        next[name] = [...asList(next[name]), ...asList(checked)];
      } else {
        next[name] = checked;
      }
    }
    return Object.freeze(next);
  }

  /**
   * Fold several deltas into one, in the given order, with the same policies
   * `merge` uses. Merging the result equals merging each delta in turn.
   */
  combine(deltas: readonly StateDelta[]): StateDelta {
    const acc: Record<string, StateValue> = {};
    for (const delta of deltas) {
      for (const [name, value] of Object.entries(delta)) {
        const field = this.requireField(name);
        if (field.policy === 'concat') {
          acc[name] = [...asList(acc[name]), ...asList(value)];
        } else {
          acc[name] = value;
        }
      }
    }
    return acc;
  }

  /** Scalar fields written by more than one of the deltas. */
  conflictingFields(deltas: readonly StateDelta[]): string[] {
    const writers = new Map<string, number>();
    for (const delta of deltas) {
      for (const name of Object.keys(delta)) {
        if (this.byName.get(name)?.policy === 'last-writer-wins') {
          writers.set(name, (writers.get(name) ?? 0) + 1);
        }
      }
    }
    return [...writers].filter(([, count]) => count > 1).map(([name]) => name);
  }

  private requireField(name: string): StateFieldSpec {
    const field = this.byName.get(name);
    if (!field) throw new StateError(`Unknown state field "${name}"`, name);
    return field;
  }

  private checkValue(field: StateFieldSpec, raw: unknown): StateValue {
    const parsed = stateValueSchema.safeParse(raw);
    if (!parsed.success || !matchesFieldType(field.type, parsed.data)) {
      throw new StateError(
        `Value for "${field.name}" does not match type ${formatFieldType(field.type)}: ${JSON.stringify(raw)}`,
        field.name,
      );
    }
    return parsed.data;
  }
}

function asList(value: StateValue | undefined): StateValue[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

/** Build the record type for a validated state field list. */
export function buildStateRecord(fields: readonly StateFieldConfig[]): StateRecordType {
  const specs = fields.map((field, index): StateFieldSpec => {
    const type = parseFieldType(field.type);
    if (!type) {
      throw new StateError(`Unsupported type "${field.type}" for field "${field.name}"`, field.name);
    }
    return {
      name: field.name,
      index,
      type,
      policy: mergePolicyFor(type),
      required: field.required,
      defaultValue: field.default ?? (type.kind === 'list' ? [] : null),
      description: field.description,
    };
  });
  return new StateRecordType(specs);
}
