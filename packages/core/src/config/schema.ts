// packages/core/src/config/schema.ts

import { z } from 'zod';
import { parseFieldType, matchesFieldType } from '../state/field-types.js';
import { stateValueSchema } from '../state/values.js';
import {
  DEFAULT_MAX_RETRIES,
  DEFAULT_MAX_TOOL_ITERATIONS,
  DEFAULT_TIMEOUT_SEC,
  END,
  MAX_TIMEOUT_SEC,
  SCHEMA_VERSION,
  START,
} from '../utils/constants.js';
import { ConfigValidationError } from '../utils/errors.js';

const identifierSchema = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be an identifier (letters, digits, underscore)');

const nodeIdSchema = identifierSchema.refine((id) => id !== START && id !== END, {
  message: `"${START}" and "${END}" are reserved`,
});

const typeStringSchema = z
  .string()
  .min(1)
  .refine((t) => parseFieldType(t) !== null, (t) => ({
    message: `Unsupported type "${t}". Use str, int, float, bool, list, list[str|int|float|bool] or dict`,
  }));

const stateFieldSchema = z
  .object({
    name: identifierSchema,
    type: typeStringSchema,
    required: z.boolean().default(false),
    default: stateValueSchema.optional(),
    description: z.string().optional(),
  })
  .superRefine((field, ctx) => {
    if (field.required && field.default !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['default'],
        message: `Field "${field.name}" is required and cannot also declare a default`,
      });
    }
    const type = parseFieldType(field.type);
    if (type && field.default !== undefined && field.default !== null && !matchesFieldType(type, field.default)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['default'],
        message: `Default for "${field.name}" does not match type ${field.type}`,
      });
    }
  });

const llmProviderSchema = z.enum(['openai', 'anthropic', 'google', 'ollama']);

const llmOverrideSchema = z.object({
  provider: llmProviderSchema.optional(),
  model: z.string().min(1).optional(),
  temperature: z.number().min(0).max(1).optional(),
  max_tokens: z.number().int().positive().optional(),
  api_base: z.string().url().optional(),
});

const llmDefaultsSchema = z.object({
  provider: llmProviderSchema.default('openai'),
  model: z.string().min(1).default('gpt-4o-mini'),
  temperature: z.number().min(0).max(1).default(0.7),
  max_tokens: z.number().int().positive().optional(),
  api_base: z.string().url().optional(),
});

const toolRefSchema = z.union([
  z
    .string()
    .min(1)
    .transform((name) => ({ name, on_error: 'continue' as const })),
  z.object({
    name: z.string().min(1),
    on_error: z.enum(['continue', 'fail']).default('continue'),
  }),
]);

const outputFieldSchema = z.object({
  name: identifierSchema,
  type: typeStringSchema,
  description: z.string().optional(),
});

const outputSchemaSchema = z
  .object({
    type: z.string().min(1),
    fields: z.array(outputFieldSchema).min(1).optional(),
    description: z.string().optional(),
  })
  .superRefine((schema, ctx) => {
    if (schema.type === 'object') {
      if (!schema.fields) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['fields'],
          message: 'Object output schemas must declare fields',
        });
      }
      return;
    }
    if (parseFieldType(schema.type) === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['type'],
        message: `Unsupported output type "${schema.type}"`,
      });
    }
    if (schema.fields) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['fields'],
        message: 'Only object output schemas may declare fields',
      });
    }
  });

const loopSchema = z.object({
  max_iterations: z.number().int().positive(),
  condition_field: identifierSchema,
  exit_to: z.string().min(1),
});

const nodeSchema = z.object({
  id: nodeIdSchema,
  description: z.string().optional(),
  prompt: z.string().min(1),
  /** Local prompt names bound to templates over state, e.g. `{ author: '{meta.author}' }`. */
  inputs: z.record(identifierSchema, z.string().min(1)).default({}),
  outputs: z.array(identifierSchema).min(1, 'A node must declare at least one output'),
  output_schema: outputSchemaSchema.optional(),
  tools: z.array(toolRefSchema).default([]),
  llm: llmOverrideSchema.optional(),
  loop: loopSchema.optional(),
  break_on_error: z.boolean().default(true),
});

const routeSchema = z.object({
  condition: z
    .union([z.string().min(1), z.object({ logic: z.string().min(1) })])
    .transform((c) => (typeof c === 'string' ? { logic: c } : c)),
  to: z.string().min(1),
});

const edgeSchema = z
  .object({
    from: z.string().min(1),
    to: z.union([z.string().min(1), z.array(z.string().min(1)).min(2, 'A fork needs at least 2 targets')]).optional(),
    routes: z.array(routeSchema).min(1).optional(),
    loop: loopSchema.optional(),
  })
  .superRefine((edge, ctx) => {
    const kinds = [edge.to, edge.routes, edge.loop].filter((v) => v !== undefined).length;
    if (kinds !== 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Edge from "${edge.from}" must declare exactly one of to, routes or loop`,
      });
    }
  });

const gateSchema = z
  .object({
    metric: z.string().min(1),
    max: z.number().optional(),
    min: z.number().optional(),
    description: z.string().optional(),
  })
  .refine((g) => g.max !== undefined || g.min !== undefined, {
    message: 'A gate needs a max or a min threshold',
  });

const executionSchema = z.object({
  timeout: z
    .number()
    .positive()
    .max(MAX_TIMEOUT_SEC, `timeout cannot exceed ${MAX_TIMEOUT_SEC} seconds`)
    .default(DEFAULT_TIMEOUT_SEC),
  max_retries: z.number().int().nonnegative().default(DEFAULT_MAX_RETRIES),
  max_tool_iterations: z.number().int().positive().default(DEFAULT_MAX_TOOL_ITERATIONS),
});

const gatesSchema = z.object({
  gates: z.array(gateSchema).default([]),
  on_fail: z.enum(['warn', 'fail', 'block_deploy']).default('warn'),
});

const globalConfigSchema = z.object({
  llm: llmDefaultsSchema.default({}),
  execution: executionSchema.default({}),
  gates: gatesSchema.optional(),
});

export const workflowConfigSchema = z
  .object({
    schema_version: z.literal(SCHEMA_VERSION).default(SCHEMA_VERSION),
    flow: z.object({
      name: z.string().min(1),
      description: z.string().optional(),
      version: z.string().optional(),
    }),
    state: z.object({
      fields: z.array(stateFieldSchema).min(1),
    }),
    nodes: z.array(nodeSchema).min(1),
    edges: z.array(edgeSchema).min(1),
    config: globalConfigSchema.default({}),
  })
  .superRefine((data, ctx) => {
    const seenNodes = new Set<string>();
    data.nodes.forEach((node, index) => {
      if (seenNodes.has(node.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['nodes', index, 'id'],
          message: `Duplicate node id "${node.id}"`,
        });
      }
      seenNodes.add(node.id);
    });

    const seenFields = new Set<string>();
    data.state.fields.forEach((field, index) => {
      if (seenFields.has(field.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['state', 'fields', index, 'name'],
          message: `Duplicate state field "${field.name}"`,
        });
      }
      seenFields.add(field.name);
    });
  });

export type WorkflowConfigInput = z.input<typeof workflowConfigSchema>;
export type WorkflowConfig = z.output<typeof workflowConfigSchema>;

/**
 * Structural validation. Throws ConfigValidationError listing every zod issue.
 */
export function validateStructure(raw: unknown): WorkflowConfig {
  const result = workflowConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigValidationError(
      result.error.issues.map((i) => ({
        code: 'structure',
        path: i.path.join('.'),
        message: i.message,
      })),
    );
  }
  return result.data;
}
