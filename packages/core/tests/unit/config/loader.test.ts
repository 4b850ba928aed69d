import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadWorkflow, parseWorkflowDocument, readWorkflowFile } from '../../../src/config/loader.js';
import { ConfigValidationError } from '../../../src/utils/errors.js';

const TEST_DIR = join(tmpdir(), `cogflow-loader-${Date.now()}`);

const DRAFT_YAML = `flow:
  name: draft-flow
state:
  fields:
    - { name: topic, type: str, required: true }
    - { name: output, type: str }
nodes:
  - id: draft
    prompt: "Write about {state.topic}"
    outputs: [output]
edges:
  - { from: START, to: draft }
  - { from: draft, to: END }
`;

beforeEach(() => {
  mkdirSync(TEST_DIR, { recursive: true });
});

afterEach(() => {
  rmSync(TEST_DIR, { recursive: true, force: true });
});

describe('parseWorkflowDocument', () => {
  it('parses YAML and JSON', () => {
    expect(parseWorkflowDocument('flow: { name: a }')).toEqual({ flow: { name: 'a' } });
    expect(parseWorkflowDocument('{"flow": {"name": "b"}}')).toEqual({ flow: { name: 'b' } });
  });

  it('reports syntax errors as a parse issue', () => {
    let caught: unknown;
    try {
      parseWorkflowDocument('nodes: [unclosed', 'broken.yaml');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigValidationError);
    if (!(caught instanceof ConfigValidationError)) return;
    expect(caught.issues).toHaveLength(1);
    expect(caught.issues[0].code).toBe('parse');
    expect(caught.issues[0].message.startsWith('Cannot parse broken.yaml: ')).toBe(true);
  });
});

describe('readWorkflowFile', () => {
  it('reports unreadable files as a read issue', () => {
    const missing = join(TEST_DIR, 'missing.yaml');
    expect(() => readWorkflowFile(missing)).toThrow(`Cannot read ${missing}`);
  });
});

describe('loadWorkflow', () => {
  it('reads and validates a workflow file', () => {
    const file = join(TEST_DIR, 'draft.yaml');
    writeFileSync(file, DRAFT_YAML, 'utf-8');
    const config = loadWorkflow(file);
    expect(config.flow.name).toBe('draft-flow');
    expect(config.nodes.map((n) => n.id)).toEqual(['draft']);
    expect(config.edges[0]).toEqual({ from: 'START', to: 'draft' });
  });

  it('applies business rules after parsing', () => {
    const file = join(TEST_DIR, 'typo.yaml');
    writeFileSync(file, DRAFT_YAML.replace('{ from: draft, to: END }', '{ from: draft, to: ENDD }'), 'utf-8');
    expect(() => loadWorkflow(file)).toThrow('Edge from "draft" references unknown node "ENDD"');
  });
});
