import { describe, it, expect } from 'vitest';
import { overallStatus } from '../../../src/scoring/aggregator.js';
import type { PatternOutput, RhythmOutput, RiskOutput } from '../../../src/scoring/types.js';

const normalRhythm: RhythmOutput = { label: 'Normal', confidence: 0.9 };
const lowRisk: RiskOutput = { label: 'Low', confidence: 0.85 };
const normalPattern: PatternOutput = { label: 'Normal', confidence: 0.88 };

describe('overallStatus', () => {
    it('is healthy when every scorer is reassuring', () => {
        expect(overallStatus(normalRhythm, lowRisk, normalPattern)).toBe('Healthy');
        expect(overallStatus(normalRhythm, lowRisk, { label: 'Variable', confidence: 0.75 })).toBe('Healthy');
        expect(overallStatus(normalRhythm, lowRisk, { label: 'Insufficient Data', confidence: 0 })).toBe('Healthy');
    });

    it('needs attention on an irregular rhythm, high risk or irregular pattern', () => {
        expect(overallStatus({ label: 'Irregular', confidence: 0.8 }, lowRisk, normalPattern)).toBe('Needs Attention');
        expect(overallStatus(normalRhythm, { label: 'High', confidence: 0.95 }, normalPattern)).toBe('Needs Attention');
        expect(overallStatus(normalRhythm, lowRisk, { label: 'Irregular', confidence: 0.95 })).toBe('Needs Attention');
    });

    it('asks to monitor on medium risk or an abnormal rate pattern', () => {
        expect(overallStatus(normalRhythm, { label: 'Medium', confidence: 0.8 }, normalPattern)).toBe('Monitor');
        expect(overallStatus(normalRhythm, lowRisk, { label: 'High(Tachycardia)', confidence: 0.92 })).toBe('Monitor');
        expect(overallStatus(normalRhythm, lowRisk, { label: 'Low(Bradycardia)', confidence: 0.9 })).toBe('Monitor');
    });

    it('prefers attention over monitor', () => {
        expect(
            overallStatus({ label: 'Irregular', confidence: 0.8 }, { label: 'Medium', confidence: 0.8 }, normalPattern),
        ).toBe('Needs Attention');
    });

    it('gives the same answer on repeated calls', () => {
        const risk: RiskOutput = { label: 'Medium', confidence: 0.8 };
        const first = overallStatus(normalRhythm, risk, normalPattern);
        const second = overallStatus(normalRhythm, risk, normalPattern);

        expect(first).toBe(second);
        expect(risk).toEqual({ label: 'Medium', confidence: 0.8 });
    });
});
