export { VERSION } from './version.js';

export {
  HealthScoreEngine,
  computeHealthScore,
  isStale,
  SCORE_VALIDITY_MS,
  type HealthScoreEngineOptions,
} from './engine/engine.js';
export { InvalidInputError, type ValidationError } from './engine/errors.js';
export type * from './engine/types.js';
export {
  ACTIVITY_LEVELS,
  SELF_REPORTED_RISKS,
  RISK_CATEGORIES,
  RECOMMENDATION_TYPES,
  RECOMMENDATION_PRIORITIES,
} from './engine/types.js';

export * as impact from './engine/impact.js';
export { calculateOverallScore, calculateRiskLevel, determineRiskCategory } from './engine/aggregate.js';
export {
  allScorers,
  scoreComponents,
  type ComponentId,
  type ComponentScorer,
  type ComponentScores,
} from './engine/components/index.js';
export { allRules, generateRecommendations, type RecommendationRule } from './engine/recommendations.js';
export { buildScoringContext, calculateBmi, type ScoringContext } from './engine/normalize.js';
export { dailyExposure, weeklyExposure } from './engine/exposure.js';
export { analyzeContributingFactors } from './engine/factors.js';
export {
  serializeResult,
  deserializeResult,
  type HealthScoreResultJson,
  type HealthRecommendationJson,
} from './engine/serialize.js';
export {
  detectScoreAlerts,
  needsImmediateAttention,
  needsAttention,
  isUrgentRecommendation,
  partitionRecommendations,
  ATTENTION_THRESHOLD,
  type ScoreAlert,
  type ScoreArea,
} from './engine/alerts.js';
export { dismissRecommendation, completeRecommendation, isRecommendationCompleted } from './engine/feedback.js';
export {
  toHistoryEntry,
  summarizeTrend,
  type HealthScoreHistoryEntry,
  type TrendSummary,
  type TrendDirection,
} from './engine/trend.js';
export {
  describeScore,
  riskCategoryLabel,
  riskCategoryColor,
  riskCategoryRank,
  healthStatus,
  healthStatusColor,
  riskLevelDescription,
  personalizedTips,
  type HealthStatus,
} from './engine/describe.js';

export { parseScoreRequest, validateScoreRequest, type ScoreRequest } from './input/request.js';
export { loadConfig, type LoadConfigOptions } from './config/loader.js';
export type { BreathscoreConfig, PartialConfig } from './config/schema.js';
export { Logger, createLogger, getLogger, type LogLevel, type LogSink } from './observability/logger.js';
