// packages/core/src/schema/output-schema.ts — Per-node structured output contract

import { z } from 'zod';
import type { StateRecordType, StateDelta } from '../state/state-record.js';
import {
  type FieldType,
  type PrimitiveTypeName,
  formatFieldType,
  parseFieldType,
} from '../state/field-types.js';
import { type StateValue, isPlainObject, stateValueSchema } from '../state/values.js';
import type { NodeConfig } from '../types/config.js';
import type { JsonSchema } from '../types/llm.js';
import { StateError } from '../utils/errors.js';

export interface OutputFieldSpec {
  name: string;
  type: FieldType;
  description?: string;
}

export type OutputValidation =
  | { ok: true; value: StateDelta }
  | { ok: false; issues: string[] };

export interface OutputSchema {
  readonly nodeId: string;
  /** `simple` schemas wrap a single output field. */
  readonly mode: 'object' | 'simple';
  readonly fields: readonly OutputFieldSpec[];
  /** Object schema handed to the model for structured generation. */
  readonly jsonSchema: JsonSchema;
  validate(raw: unknown): OutputValidation;
}

function primitiveZod(name: PrimitiveTypeName): z.ZodType<StateValue> {
  switch (name) {
    case 'str':
      return z.string();
    case 'int':
      return z.number().int();
    case 'float':
      return z.number().finite();
    case 'bool':
      return z.boolean();
  }
}

function zodFor(type: FieldType): z.ZodType<StateValue> {
  switch (type.kind) {
    case 'primitive':
      return primitiveZod(type.name);
    case 'list':
      return z.array(type.item ? primitiveZod(type.item) : stateValueSchema);
    case 'dict':
      return z.record(stateValueSchema);
  }
}

const JSON_TYPES: Record<PrimitiveTypeName, string> = {
  str: 'string',
  int: 'integer',
  float: 'number',
  bool: 'boolean',
};

function jsonSchemaFor(type: FieldType): JsonSchema {
  switch (type.kind) {
    case 'primitive':
      return { type: JSON_TYPES[type.name] };
    case 'list':
      return type.item ? { type: 'array', items: { type: JSON_TYPES[type.item] } } : { type: 'array' };
    case 'dict':
      return { type: 'object' };
  }
}

function resolveFields(node: NodeConfig, state: StateRecordType): OutputFieldSpec[] {
  const declared = node.output_schema;

  if (declared?.type === 'object' && declared.fields) {
    return declared.fields.map((field) => ({
      name: field.name,
      type: requireType(field.type, node.id),
      description: field.description,
    }));
  }

  if (declared) {
    return [{ name: node.outputs[0], type: requireType(declared.type, node.id), description: declared.description }];
  }

  // No explicit schema: each output takes its state field's type.
  return node.outputs.map((name) => {
    const field = state.field(name);
    if (!field) {
      throw new StateError(`Node "${node.id}" writes unknown state field "${name}"`, name);
    }
    return { name, type: field.type, description: field.description };
  });
}

function requireType(raw: string, nodeId: string): FieldType {
  const type = parseFieldType(raw);
  if (!type) throw new StateError(`Node "${nodeId}" declares unsupported output type "${raw}"`);
  return type;
}

/**
 * Build the output contract for one node. Pure; called once per node when the
 * plan is compiled.
 */
export function buildOutputSchema(node: NodeConfig, state: StateRecordType): OutputSchema {
  const fields = resolveFields(node, state);
  const mode = node.output_schema && node.output_schema.type !== 'object' ? 'simple' : 'object';

  const shape: Record<string, z.ZodType<StateValue>> = {};
  const properties: Record<string, JsonSchema> = {};
  for (const field of fields) {
    shape[field.name] = zodFor(field.type);
    properties[field.name] = field.description
      ? { ...jsonSchemaFor(field.type), description: field.description }
      : jsonSchemaFor(field.type);
  }
  const validator = z.object(shape);

  const jsonSchema: JsonSchema = {
    type: 'object',
    properties,
    required: fields.map((f) => f.name),
    additionalProperties: false,
  };

  return {
    nodeId: node.id,
    mode,
    fields,
    jsonSchema,
    validate(raw: unknown): OutputValidation {
      let candidate = raw;
      if (mode === 'simple') {
        const [only] = fields;
        // Simple outputs may arrive bare or wrapped in their field name.
        candidate = isPlainObject(raw) && Object.hasOwn(raw, only.name) ? raw : { [only.name]: raw };
      }

      const result = validator.safeParse(candidate);
      if (!result.success) {
        return {
          ok: false,
          issues: result.error.issues.map((i) =>
            i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message,
          ),
        };
      }

      const value: Record<string, StateValue> = {};
      for (const field of fields) {
        value[field.name] = result.data[field.name];
      }
      return { ok: true, value };
    },
  };
}

/** Human-readable `name: type` listing, used in correction prompts. */
export function describeOutputFields(schema: OutputSchema): string {
  return schema.fields.map((f) => `${f.name}: ${formatFieldType(f.type)}`).join(', ');
}
