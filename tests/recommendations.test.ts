import { describe, it, expect } from 'vitest';
import {
  allRules,
  generateRecommendations,
  indoorRule,
  type RecommendationInput,
  type RecommendationRule,
} from '../src/engine/recommendations.js';
import { NOW, makeReading, makeUser, sequentialIds } from './helpers/test-utils.js';

function makeInput(overrides: Partial<RecommendationInput> = {}): RecommendationInput {
  return {
    overallScore: 90,
    riskCategory: 'Low',
    components: { respiratory: 95, cardiovascular: 95, immune: 95, activityImpact: 95 },
    reading: makeReading(),
    user: makeUser(),
    ...overrides,
  };
}

function generate(input: RecommendationInput, rules?: readonly RecommendationRule[]) {
  return generateRecommendations(input, { now: NOW, generateId: sequentialIds('rec') }, rules);
}

describe('Recommendation Rules', () => {
  it('should produce nothing for a healthy, active user in clean air', () => {
    expect(generate(makeInput())).toEqual([]);
  });

  it('should raise an urgent medical recommendation for a Critical category', () => {
    const [first] = generate(makeInput({ riskCategory: 'Critical', overallScore: 45 }));
    expect(first).toMatchObject({
      id: 'rec-1',
      type: 'Medical',
      priority: 'Critical',
      title: 'Seek Medical Attention',
      category: 'Emergency',
      isUrgent: true,
    });
  });

  it('should raise the medical recommendation for an overall score below 30', () => {
    const recs = generate(makeInput({ riskCategory: 'High', overallScore: 29 }));
    expect(recs.map(r => r.type)).toEqual(['Medical']);
  });

  it('should not raise the medical recommendation at exactly 30', () => {
    expect(generate(makeInput({ riskCategory: 'High', overallScore: 30 }))).toEqual([]);
  });

  it('should escalate the respiratory recommendation with the risk category', () => {
    const components = { respiratory: 59, cardiovascular: 95, immune: 95, activityImpact: 95 };

    const high = generate(makeInput({ components, riskCategory: 'High', overallScore: 60 }));
    expect(high).toHaveLength(1);
    expect(high[0]).toMatchObject({ type: 'Respiratory', priority: 'High', isUrgent: false });

    const critical = generate(makeInput({ components, riskCategory: 'Critical', overallScore: 60 }));
    expect(critical.map(r => [r.type, r.priority, r.isUrgent])).toEqual([
      ['Medical', 'Critical', true],
      ['Respiratory', 'Critical', true],
    ]);
  });

  it('should not raise the respiratory recommendation at exactly 60', () => {
    const components = { respiratory: 60, cardiovascular: 95, immune: 95, activityImpact: 95 };
    expect(generate(makeInput({ components }))).toEqual([]);
  });

  it('should suggest adjusting activity below an activity impact of 50', () => {
    const components = { respiratory: 95, cardiovascular: 95, immune: 95, activityImpact: 49.5 };
    const recs = generate(makeInput({ components }));
    expect(recs.map(r => [r.type, r.priority, r.category])).toEqual([['Activity', 'Medium', 'Lifestyle']]);
  });

  it('should trigger the indoor recommendation strictly above AQI 100', () => {
    expect(indoorRule.applies(makeInput({ reading: makeReading({ aqi: 100 }) }))).toBe(false);
    expect(indoorRule.applies(makeInput({ reading: makeReading({ aqi: 101 }) }))).toBe(true);
    expect(indoorRule.applies(makeInput({ reading: makeReading({ aqi: 120 }) }))).toBe(true);
  });

  it('should suggest more exercise to sedentary users', () => {
    const recs = generate(makeInput({ user: makeUser({ activityLevel: 'sedentary' }) }));
    expect(recs.map(r => [r.type, r.priority, r.title])).toEqual([['Lifestyle', 'Low', 'Increase Physical Activity']]);
  });

  it('should emit every firing rule in rule order', () => {
    const recs = generate(
      makeInput({
        overallScore: 20,
        riskCategory: 'Critical',
        components: { respiratory: 10, cardiovascular: 10, immune: 40, activityImpact: 20 },
        reading: makeReading({ aqi: 300 }),
        user: makeUser({ activityLevel: 'sedentary' }),
      })
    );

    expect(recs.map(r => r.type)).toEqual(['Medical', 'Respiratory', 'Activity', 'Indoor', 'Lifestyle']);
    expect(recs.map(r => r.id)).toEqual(['rec-1', 'rec-2', 'rec-3', 'rec-4', 'rec-5']);
  });

  it('should stamp each recommendation with the computation time', () => {
    const recs = generate(makeInput({ user: makeUser({ activityLevel: 'sedentary' }) }));
    expect(recs[0]?.createdAt).toEqual(NOW);
    expect(recs[0]?.createdAt).not.toBe(NOW);
  });

  it('should accept a custom rule set', () => {
    const recs = generate(makeInput({ reading: makeReading({ aqi: 150 }) }), [indoorRule]);
    expect(recs.map(r => r.title)).toEqual(['Improve Indoor Air Quality']);
  });

  it('should list each action as non-empty text', () => {
    for (const rule of allRules) {
      const draft = rule.build(makeInput({ riskCategory: 'Critical' }));
      expect(draft.actions).toHaveLength(4);
      expect(draft.actions.every(action => action.length > 0)).toBe(true);
    }
  });
});
