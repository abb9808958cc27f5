#!/usr/bin/env node
/**
 * Example computing, storing and comparing health scores through the library API
 *
 * Run with a TypeScript loader, e.g.: npx tsx examples/score-example.ts
 */

import {
  HealthScoreEngine,
  createLogger,
  describeScore,
  deserializeResult,
  detectScoreAlerts,
  dismissRecommendation,
  healthStatus,
  partitionRecommendations,
  personalizedTips,
  riskCategoryLabel,
  serializeResult,
  summarizeTrend,
  toHistoryEntry,
  type AirQualityReading,
} from '../src/index.js';

function reading(aqi: number, pm25: number, timestamp: Date): AirQualityReading {
  return {
    latitude: 48.85,
    longitude: 2.35,
    pm25,
    pm10: pm25 * 1.5,
    no2: 30,
    so2: 4,
    o3: 60,
    co: 0.4,
    aqi,
    temperature: 21,
    humidity: 48,
    windSpeed: 2.5,
    source: 'example-station',
    timestamp,
  };
}

function main(): void {
  createLogger({ level: 'debug', json: false });
  const engine = new HealthScoreEngine();

  const user = { id: 'example-user', age: 58, heightCm: 172, weightKg: 81, activityLevel: 'light' as const };
  const health = {
    respiratoryConditions: ['asthma'],
    cardiovascularConditions: [],
    riskLevel: 'medium' as const,
    baselineLungCapacity: 3.9,
  };

  const now = new Date();
  const history = Array.from({ length: 12 }, (_, i) =>
    reading(70 + i * 5, 20 + i * 2, new Date(now.getTime() - (i + 1) * 6 * 60 * 60 * 1000))
  );

  // 1. Score a moderate morning
  const morning = engine.computeHealthScore(user.id, user, health, reading(85, 28, now), history);
  console.log(`Morning: ${morning.overallScore}/100 ${riskCategoryLabel(morning.riskCategory)}`);
  console.log(describeScore(morning.overallScore));

  // 2. Store it as JSON and load it back
  const stored = JSON.stringify(serializeResult(morning));
  const restored = deserializeResult(JSON.parse(stored));

  // 3. Score a smoggy afternoon and compare
  const afternoon = engine.computeHealthScore(user.id, user, health, reading(210, 140, now), history);
  console.log(`Afternoon: ${afternoon.overallScore}/100 ${riskCategoryLabel(afternoon.riskCategory)}`);
  for (const alert of detectScoreAlerts(restored, afternoon)) {
    console.log('Alert:', alert);
  }

  // 4. Summarize both
  const trend = summarizeTrend([toHistoryEntry(restored), toHistoryEntry(afternoon)]);
  console.log('Trend:', trend?.direction, trend?.change);
  const { urgent, general } = partitionRecommendations(afternoon);
  console.log('Urgent:', urgent.map(rec => rec.title));
  console.log('Other:', general.map(rec => rec.title));
  console.log(`Status: ${healthStatus(afternoon.overallScore)}`, personalizedTips(afternoon));

  // 5. Dismiss the first general recommendation
  const first = general[0];
  if (first) {
    const remaining = dismissRecommendation(afternoon, first.id).recommendations.length;
    console.log(`Dismissed ${first.title}; ${remaining} left`);
  }
}

main();
