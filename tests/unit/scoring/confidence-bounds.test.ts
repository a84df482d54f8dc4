import { describe, it, expect } from 'vitest';
import { rrIntervalsFromHeartRates, scorePattern } from '../../../src/scoring/pattern.js';
import { scoreRhythm } from '../../../src/scoring/rhythm.js';
import { scoreRisk } from '../../../src/scoring/risk.js';
import { scoreFitness } from '../../../src/scoring/fitness.js';

const EXTREMES = [Number.NaN, Number.NEGATIVE_INFINITY, -1e9, -1, 0, 0.5, 1, 45, 120, 1e9, Number.POSITIVE_INFINITY];

function expectUnit(value: number): void {
    expect(value).toBeGreaterThanOrEqual(0);
    expect(value).toBeLessThanOrEqual(1);
}

describe('confidence bounds', () => {
    it('keeps rhythm and risk confidences in [0, 1] for extreme inputs', () => {
        for (const a of EXTREMES) {
            for (const b of EXTREMES) {
                expectUnit(scoreRhythm({ meanHeartRate: a, stdHeartRate: b, pnn50: a }).confidence);
                expectUnit(
                    scoreRisk({ avgHeartRate: a, hrvMean: b, respiratoryRate: a, activityLevel: b, sleepRatio: a }).confidence,
                );
            }
        }
    });

    it('keeps pattern confidence in [0, 1] for extreme heart rates', () => {
        for (const a of EXTREMES) {
            for (const b of EXTREMES) {
                expectUnit(scorePattern(rrIntervalsFromHeartRates([a, b, a, b, a, b])).confidence);
            }
            expectUnit(scorePattern([a, a, a, a, a]).confidence);
        }
    });

    it('keeps fitness outputs finite for extreme inputs', () => {
        for (const a of EXTREMES) {
            const result = scoreFitness({ heartRates: [60, 70], meanHeartRate: a, hrvMean: a, sleepQuality: a }, { age: 40 });

            expect(Number.isFinite(result.fitnessScore)).toBe(true);
            expect(result.fitnessScore).toBeGreaterThanOrEqual(10);
            expect(result.fitnessScore).toBeLessThanOrEqual(95);
            expect(result.trainingReadiness).toBeGreaterThanOrEqual(0);
            expect(result.trainingReadiness).toBeLessThanOrEqual(100);
        }
    });
});
