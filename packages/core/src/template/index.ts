// packages/core/src/template/index.ts -- barrel re-export

export { resolveTemplate, resolveInputs, findPlaceholders } from './resolver.js';
export type { Placeholder, ResolvedInputs } from './resolver.js';
