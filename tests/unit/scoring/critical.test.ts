import { describe, it, expect } from 'vitest';
import { checkCriticalConditions } from '../../../src/scoring/critical.js';

const calm = { heartRate: 70, activityLevel: 250, respiratoryRate: 16, hrvMean: 50 };

describe('checkCriticalConditions', () => {
    it('returns nothing for calm vitals', () => {
        expect(checkCriticalConditions(calm)).toEqual([]);
    });

    it('flags a very high rate at rest but not during activity', () => {
        expect(checkCriticalConditions({ ...calm, heartRate: 155, activityLevel: 50 }).map((s) => s.code)).toEqual([
            'HIGH_RESTING_HEART_RATE',
        ]);
        expect(checkCriticalConditions({ ...calm, heartRate: 155, activityLevel: 400 })).toEqual([]);
    });

    it('flags a very low rate', () => {
        expect(checkCriticalConditions({ ...calm, heartRate: 38 })).toEqual([
            {
                code: 'LOW_HEART_RATE',
                message: 'Dangerously low heart rate detected. Seek immediate medical attention.',
            },
        ]);
    });

    it('flags respiratory rate outside [8, 25]', () => {
        expect(checkCriticalConditions({ ...calm, respiratoryRate: 26 })[0]?.code).toBe('ABNORMAL_RESPIRATORY_RATE');
        expect(checkCriticalConditions({ ...calm, respiratoryRate: 7 })[0]?.code).toBe('ABNORMAL_RESPIRATORY_RATE');
        expect(checkCriticalConditions({ ...calm, respiratoryRate: 25 })).toEqual([]);
        expect(checkCriticalConditions({ ...calm, respiratoryRate: 8 })).toEqual([]);
    });

    it('returns every matching signal in a fixed order', () => {
        const signals = checkCriticalConditions({ heartRate: 160, activityLevel: 20, respiratoryRate: 30, hrvMean: 5 });

        expect(signals.map((s) => s.code)).toEqual([
            'HIGH_RESTING_HEART_RATE',
            'ABNORMAL_RESPIRATORY_RATE',
            'LOW_HRV_ELEVATED_HEART_RATE',
        ]);
    });
});
