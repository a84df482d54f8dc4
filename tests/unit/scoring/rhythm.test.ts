import { describe, it, expect } from 'vitest';
import { irregularityScore, scoreRhythm } from '../../../src/scoring/rhythm.js';

describe('scoreRhythm', () => {
    it('reads a calm resting window as normal', () => {
        const result = scoreRhythm({ meanHeartRate: 65, stdHeartRate: 5.2, pnn50: 0.3 });

        expect(result.label).toBe('Normal');
        expect(result.confidence).toBe(1);
    });

    it('flags a wide spread with little beat-to-beat change', () => {
        const inputs = { meanHeartRate: 88, stdHeartRate: 18.5, pnn50: 0.05 };

        // 0.4 spread + 0.3 low ratio at a raised rate + 0.1 combined
        expect(irregularityScore(inputs)).toBeCloseTo(0.8);
        expect(scoreRhythm(inputs).label).toBe('Irregular');
        expect(scoreRhythm(inputs).confidence).toBeCloseTo(0.8);
    });

    it('keeps a slow but steady rhythm normal', () => {
        const result = scoreRhythm({ meanHeartRate: 45, stdHeartRate: 3.8, pnn50: 0.3 });

        expect(result.label).toBe('Normal');
        expect(result.confidence).toBeCloseTo(0.8);
    });

    it('flags a fast rate only together with a low ratio', () => {
        expect(scoreRhythm({ meanHeartRate: 165, stdHeartRate: 4.2, pnn50: 0.05 })).toEqual({
            label: 'Irregular',
            confidence: 0.5,
        });
        expect(scoreRhythm({ meanHeartRate: 165, stdHeartRate: 4.2, pnn50: 0.3 }).label).toBe('Normal');
    });

    it('caps irregular confidence at 0.95', () => {
        const result = scoreRhythm({ meanHeartRate: 160, stdHeartRate: 40, pnn50: 0 });

        expect(irregularityScore({ meanHeartRate: 160, stdHeartRate: 40, pnn50: 0 })).toBeCloseTo(1);
        expect(result.confidence).toBe(0.95);
    });

    it('clamps inputs before scoring', () => {
        // 500 bpm clamps to 250 and a negative spread to 0
        expect(irregularityScore({ meanHeartRate: 500, stdHeartRate: -10, pnn50: 2 })).toBeCloseTo(0.2);
    });
});
