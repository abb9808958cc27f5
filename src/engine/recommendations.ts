import type { ComponentScores } from './components/types.js';
import type {
  AirQualityReading,
  HealthRecommendation,
  RecommendationPriority,
  RecommendationType,
  RiskCategory,
  UserProfile,
} from './types.js';

export interface RecommendationInput {
  overallScore: number;
  riskCategory: RiskCategory;
  components: ComponentScores;
  reading: AirQualityReading;
  user: UserProfile;
}

export type RecommendationDraft = Omit<HealthRecommendation, 'id' | 'createdAt'>;

export interface RecommendationRule {
  id: string;
  applies(input: RecommendationInput): boolean;
  build(input: RecommendationInput): RecommendationDraft;
}

function draft(
  type: RecommendationType,
  priority: RecommendationPriority,
  fields: Omit<RecommendationDraft, 'type' | 'priority'>
): RecommendationDraft {
  return { type, priority, ...fields };
}

export const medicalRule: RecommendationRule = {
  id: 'medical',
  applies: ({ riskCategory, overallScore }) => riskCategory === 'Critical' || overallScore < 30,
  build: () =>
    draft('Medical', 'Critical', {
      title: 'Seek Medical Attention',
      description: 'Current air quality poses significant health risks. Consider consulting a healthcare provider.',
      actions: [
        'Limit outdoor activities',
        'Use air purifiers indoors',
        'Wear N95 masks if going outside',
        'Monitor symptoms closely',
      ],
      category: 'Emergency',
      isUrgent: true,
    }),
};

export const respiratoryRule: RecommendationRule = {
  id: 'respiratory',
  applies: ({ components }) => components.respiratory < 60,
  build: ({ riskCategory }) =>
    draft('Respiratory', riskCategory === 'Critical' ? 'Critical' : 'High', {
      title: 'Protect Your Respiratory Health',
      description: 'Air quality is affecting your breathing health. Take protective measures.',
      actions: [
        'Keep windows closed during high pollution periods',
        'Use HEPA air filters at home',
        'Consider respiratory protection for outdoor activities',
        'Monitor breathing patterns and symptoms',
      ],
      category: 'Respiratory',
      isUrgent: riskCategory === 'Critical',
    }),
};

export const activityRule: RecommendationRule = {
  id: 'activity',
  applies: ({ components }) => components.activityImpact < 50,
  build: () =>
    draft('Activity', 'Medium', {
      title: 'Adjust Your Activity Schedule',
      description: 'Consider indoor alternatives to outdoor activities due to air quality.',
      actions: [
        'Move exercise indoors during poor air days',
        'Choose less polluted routes for outdoor activities',
        'Exercise during early morning or evening hours',
        'Use air quality forecasts to plan activities',
      ],
      category: 'Lifestyle',
      isUrgent: false,
    }),
};

export const indoorRule: RecommendationRule = {
  id: 'indoor',
  // Strictly above 100
  applies: ({ reading }) => reading.aqi > 100,
  build: () =>
    draft('Indoor', 'Medium', {
      title: 'Improve Indoor Air Quality',
      description: 'Protect yourself indoors by improving air filtration.',
      actions: [
        'Keep windows and doors closed',
        'Use air purifiers with HEPA filters',
        'Avoid indoor air pollution sources',
        'Monitor indoor air quality with sensors',
      ],
      category: 'Indoor',
      isUrgent: false,
    }),
};

export const lifestyleRule: RecommendationRule = {
  id: 'lifestyle',
  applies: ({ user }) => user.activityLevel === 'sedentary',
  build: () =>
    draft('Lifestyle', 'Low', {
      title: 'Increase Physical Activity',
      description: 'Regular exercise can improve your resilience to air pollution.',
      actions: [
        'Start with light indoor exercises',
        'Use air quality data to plan outdoor activities',
        'Consider yoga or tai chi for gentle exercise',
        'Gradually increase activity level over time',
      ],
      category: 'Lifestyle',
      isUrgent: false,
    }),
};

/** Evaluation order is output order. */
export const allRules: readonly RecommendationRule[] = [
  medicalRule,
  respiratoryRule,
  activityRule,
  indoorRule,
  lifestyleRule,
];

export interface RecommendationOptions {
  now: Date;
  generateId: () => string;
}

/**
 * Every rule is evaluated; several may fire for the same input.
 */
export function generateRecommendations(
  input: RecommendationInput,
  options: RecommendationOptions,
  rules: readonly RecommendationRule[] = allRules
): HealthRecommendation[] {
  const recommendations: HealthRecommendation[] = [];

  for (const rule of rules) {
    if (!rule.applies(input)) continue;
    recommendations.push({
      id: options.generateId(),
      ...rule.build(input),
      createdAt: new Date(options.now.getTime()),
    });
  }

  return recommendations;
}
