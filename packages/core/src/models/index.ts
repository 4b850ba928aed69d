// packages/core/src/models/index.ts -- barrel re-export

export { calculateCost, getModelPricing } from './pricing.js';
export type { ModelPricing } from './pricing.js';
export {
  CommandLlmClient,
  buildStructuredPrompt,
  buildToolPrompt,
  extractJson,
  parseToolReply,
  renderConversation,
  splitCommand,
  estimateTokenUsage,
} from './command-client.js';
export type { CommandLlmClientOptions } from './command-client.js';
