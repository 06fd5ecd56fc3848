// packages/core/src/models -- Agent backend, pricing and cost accounting

export { CostTracker, BUILD_PHASES, addUsage, emptyUsage } from './cost-tracker.js';
export { getModelPricing, calculateCost } from './pricing.js';
export type { ModelPricing } from './pricing.js';
export {
  CliBackend,
  buildFilteredEnv,
  killProcessTree,
  parseStreamJson,
  parseStreamLine,
} from './cli-backend.js';
export type { StreamEvent } from './cli-backend.js';
