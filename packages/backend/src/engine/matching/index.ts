export {
  parseCapabilities,
  serializeCapabilities,
  satisfies,
  specMatch,
  meetsAll,
  strictlyDominates,
} from './capability.js';
export { compareIds, SCORE_EPSILON } from './order.js';

export { rankAssetDemand, DEFAULT_DEMAND_RANK_OPTIONS } from './demand-ranker.js';
export type { DemandRankOptions, DemandRanking, AssetDemandScore } from './demand-ranker.js';

export { analyzeGap, CAPACITY_STATUSES } from './gap-analyzer.js';
export type { GapAnalysis, CategoryGap, GapStatus } from './gap-analyzer.js';

export { matchUrgentRequest, URGENT_MATCH_WEIGHTS } from './urgent-matcher.js';
export type { UrgentRequest, UrgentMatch, UrgentMatchResult, UpgradeSuggestion } from './urgent-matcher.js';

export { optimizeAllocation, budgetStepFor, PRIORITY_WEIGHTS, MAX_BUDGET_STEPS } from './allocation-optimizer.js';
export type { OptimizerInput, OptimizationResult, RequirementFulfilment } from './allocation-optimizer.js';

export { groupCollaborators, DisjointSet } from './collaboration-grouper.js';
export type { CollaborationGraph, CollaborationNode, CollaborationEdge, Community } from './collaboration-grouper.js';

export { aggregateUtilizationTrend, bucketByDay, toCentiHours, utcDay, formatDay } from './trend-aggregator.js';
export type { TrendRequest, TrendPoint, PeakDay, UtilizationTrend } from './trend-aggregator.js';

export { findUpgradePath } from './upgrade-path.js';
export type { UpgradeTarget } from './upgrade-path.js';
