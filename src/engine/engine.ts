import { randomUUID } from 'node:crypto';
import { calculateOverallScore, calculateRiskLevel, determineRiskCategory } from './aggregate.js';
import { scoreComponents } from './components/index.js';
import { InvalidInputError, formatValidationErrors, type ValidationError } from './errors.js';
import { analyzeContributingFactors } from './factors.js';
import { buildScoringContext } from './normalize.js';
import { generateRecommendations } from './recommendations.js';
import type { AirQualityReading, HealthProfile, HealthScoreResult, UserProfile } from './types.js';
import { getLogger, type LogSink } from '../observability/logger.js';

/** A result is valid for 2 hours from its timestamp. */
export const SCORE_VALIDITY_MS = 2 * 60 * 60 * 1000;

export interface HealthScoreEngineOptions {
  clock?: () => Date;
  generateId?: () => string;
  logger?: LogSink;
}

/**
 * True once `now` has reached the result's expiry.
 */
export function isStale(result: Pick<HealthScoreResult, 'expiresAt'>, now: Date = new Date()): boolean {
  return now.getTime() >= result.expiresAt.getTime();
}

function validateRequired(
  userId: string,
  userProfile: UserProfile | null | undefined,
  healthProfile: HealthProfile | null | undefined,
  currentReading: AirQualityReading | null | undefined
): ValidationError[] {
  const errors: ValidationError[] = [];

  if (typeof userId !== 'string' || userId.trim() === '') {
    errors.push({ path: 'userId', message: 'Must be a non-empty string' });
  }
  if (!userProfile) {
    errors.push({ path: 'userProfile', message: 'User profile is required' });
  }
  if (!healthProfile) {
    errors.push({ path: 'healthProfile', message: 'Health profile is required' });
  }
  if (!currentReading) {
    errors.push({ path: 'currentReading', message: 'Current air quality reading is required' });
  }

  return errors;
}

export class HealthScoreEngine {
  private readonly clock: () => Date;
  private readonly generateId: () => string;
  private readonly logger: LogSink | undefined;

  constructor(options: HealthScoreEngineOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
    this.generateId = options.generateId ?? (() => randomUUID());
    this.logger = options.logger;
  }

  // Resolved per call so a logger configured after construction still applies
  private get log(): LogSink {
    return this.logger ?? getLogger();
  }

  computeHealthScore(
    userId: string,
    userProfile: UserProfile | null | undefined,
    healthProfile: HealthProfile | null | undefined,
    currentReading: AirQualityReading | null | undefined,
    history?: AirQualityReading[]
  ): HealthScoreResult {
    const errors = validateRequired(userId, userProfile, healthProfile, currentReading);
    if (errors.length > 0 || !userProfile || !healthProfile || !currentReading) {
      throw new InvalidInputError(`Invalid health score input: ${formatValidationErrors(errors)}`, errors);
    }

    const now = this.clock();
    const context = buildScoringContext(userProfile, healthProfile, currentReading, history, now);

    const components = scoreComponents(context);
    const overall = calculateOverallScore(components, context.reading.aqi);
    const riskLevel = calculateRiskLevel(overall, context.health.riskLevel);
    const riskCategory = determineRiskCategory(riskLevel);

    const recommendations = generateRecommendations(
      {
        overallScore: overall,
        riskCategory,
        components,
        reading: context.reading,
        user: userProfile,
      },
      { now, generateId: this.generateId }
    );

    const result: HealthScoreResult = {
      id: this.generateId(),
      userId,
      overallScore: Math.round(overall),
      respiratoryScore: Math.round(components.respiratory),
      cardiovascularScore: Math.round(components.cardiovascular),
      immuneScore: Math.round(components.immune),
      activityImpactScore: Math.round(components.activityImpact),
      riskLevel,
      riskCategory,
      contributingFactors: analyzeContributingFactors(context),
      recommendations,
      timestamp: new Date(now.getTime()),
      expiresAt: new Date(now.getTime() + SCORE_VALIDITY_MS),
    };

    this.log.debug('Health score computed', {
      userId,
      overallScore: result.overallScore,
      riskCategory,
      recommendations: recommendations.length,
      historySamples: history?.length ?? 0,
    });

    return result;
  }

  isStale(result: Pick<HealthScoreResult, 'expiresAt'>): boolean {
    return isStale(result, this.clock());
  }
}

const defaultEngine = new HealthScoreEngine();

export function computeHealthScore(
  userId: string,
  userProfile: UserProfile | null | undefined,
  healthProfile: HealthProfile | null | undefined,
  currentReading: AirQualityReading | null | undefined,
  history?: AirQualityReading[]
): HealthScoreResult {
  return defaultEngine.computeHealthScore(userId, userProfile, healthProfile, currentReading, history);
}
