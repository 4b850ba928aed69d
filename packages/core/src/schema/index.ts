// packages/core/src/schema/index.ts -- barrel re-export

export { buildOutputSchema, describeOutputFields } from './output-schema.js';
export type { OutputSchema, OutputFieldSpec, OutputValidation } from './output-schema.js';
