// packages/core/src/config/loader.ts

import { readFileSync } from 'node:fs';
import { YAMLParseError, parse as parseYaml } from 'yaml';
import type { WorkflowConfig } from '../types/config.js';
import { ConfigValidationError } from '../utils/errors.js';
import { type ValidateOptions, validateWorkflow } from './validator.js';

/**
 * Parse a workflow document (YAML or JSON) into a plain object.
 * Syntax errors surface as a single `parse` issue.
 */
export function parseWorkflowDocument(text: string, source = '<inline>'): unknown {
  try {
    return parseYaml(text);
  } catch (err) {
    const detail = err instanceof YAMLParseError ? err.message : String(err);
    throw new ConfigValidationError([
      { code: 'parse', path: '', message: `Cannot parse ${source}: ${detail}` },
    ]);
  }
}

export function readWorkflowFile(filePath: string): unknown {
  let text: string;
  try {
    text = readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new ConfigValidationError([
      {
        code: 'read',
        path: '',
        message: `Cannot read ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
      },
    ]);
  }
  return parseWorkflowDocument(text, filePath);
}

/** Read, parse and fully validate a workflow file. */
export function loadWorkflow(filePath: string, options?: ValidateOptions): WorkflowConfig {
  return validateWorkflow(readWorkflowFile(filePath), options);
}
