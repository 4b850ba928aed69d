// packages/core/src/config/index.ts -- barrel re-export

export { workflowConfigSchema, validateStructure } from './schema.js';
export type { WorkflowConfigInput } from './schema.js';
export { validateWorkflow, collectIssues } from './validator.js';
export type { ValidateOptions, ToolLookup } from './validator.js';
export { loadWorkflow, readWorkflowFile, parseWorkflowDocument } from './loader.js';
export {
  collectEdges,
  edgeTargets,
  buildAdjacency,
  bfsOrder,
  reachableFrom,
  findJoinNode,
  distancesFrom,
  isDefaultRoute,
  DEFAULT_ROUTE,
} from './graph.js';
export type { EdgeEntry, Adjacency } from './graph.js';
export { suggestName, levenshtein } from './suggest.js';
