export const ACTIVITY_LEVELS = ['sedentary', 'light', 'moderate', 'active', 'very_active'] as const;
export type ActivityLevel = (typeof ACTIVITY_LEVELS)[number];

export const SELF_REPORTED_RISKS = ['low', 'medium', 'high'] as const;
export type SelfReportedRisk = (typeof SELF_REPORTED_RISKS)[number];

export const RISK_CATEGORIES = ['Low', 'Medium', 'High', 'Critical'] as const;
export type RiskCategory = (typeof RISK_CATEGORIES)[number];

export const RECOMMENDATION_TYPES = ['Medical', 'Respiratory', 'Activity', 'Indoor', 'Lifestyle'] as const;
export type RecommendationType = (typeof RECOMMENDATION_TYPES)[number];

export const RECOMMENDATION_PRIORITIES = ['Critical', 'High', 'Medium', 'Low'] as const;
export type RecommendationPriority = (typeof RECOMMENDATION_PRIORITIES)[number];

export interface AirQualityReading {
  latitude: number;
  longitude: number;
  pm25: number; // µg/m³
  pm10: number; // µg/m³
  no2: number; // µg/m³
  so2: number; // µg/m³
  o3: number; // µg/m³
  co: number; // ppm
  aqi: number; // 0-500
  temperature: number;
  humidity: number;
  windSpeed: number;
  source: string;
  timestamp: Date;
}

export interface UserProfile {
  id: string;
  age: number;
  heightCm?: number;
  weightKg?: number;
  activityLevel: ActivityLevel;
}

export interface HealthProfile {
  respiratoryConditions: string[];
  cardiovascularConditions: string[];
  riskLevel: SelfReportedRisk;
  baselineLungCapacity: number;
}

export interface HealthRecommendation {
  id: string;
  type: RecommendationType;
  priority: RecommendationPriority;
  title: string;
  description: string;
  actions: string[];
  category: string;
  isUrgent: boolean;
  createdAt: Date;
}

export type PollutantName = 'PM2.5' | 'AQI' | 'PM10' | 'NO2' | 'O3';

export type AirCondition =
  | 'Good conditions'
  | 'Acceptable but watch'
  | 'Moderate and concerning'
  | 'Poor and worsening';

export type AgeGroup = 'Child/Youth' | 'Young Adult' | 'Adult' | 'Middle Age' | 'Senior';

export interface AirQualityFactor {
  kind: 'air_quality';
  aqi: number;
  pm25: number;
  primaryConcern: PollutantName;
  condition: AirCondition;
}

export interface VulnerabilityFactor {
  kind: 'vulnerability';
  ageFactor: number;
  bmiFactor: number;
  activityFactor: number;
  healthConditions: {
    respiratory: string[];
    cardiovascular: string[];
    overallRisk: SelfReportedRisk;
  };
}

export interface ProtectiveFactor {
  kind: 'protective';
  activityLevel: ActivityLevel;
  ageGroup: AgeGroup;
  baselineLungCapacity: number;
}

export interface ExposureFactor {
  kind: 'exposure';
  historySamples: number;
  dailyAverageAqi: number | null;
  weeklyAverageAqi: number | null;
}

export interface ContributingFactors {
  airQuality: AirQualityFactor;
  vulnerability: VulnerabilityFactor;
  protective: ProtectiveFactor;
  exposure: ExposureFactor;
}

export interface HealthScoreResult {
  id: string;
  userId: string;
  overallScore: number;
  respiratoryScore: number;
  cardiovascularScore: number;
  immuneScore: number;
  activityImpactScore: number;
  riskLevel: number; // 0-1, 1 = highest risk
  riskCategory: RiskCategory;
  contributingFactors: ContributingFactors;
  recommendations: HealthRecommendation[];
  timestamp: Date;
  expiresAt: Date;
}
