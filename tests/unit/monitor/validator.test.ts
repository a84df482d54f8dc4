import { describe, it, expect } from 'vitest';
import { validateSample } from '../../../src/monitor/validator.js';

describe('validateSample', () => {
    it('accepts readings inside the physiological range', () => {
        expect(validateSample(72, 1_000, 'resting')).toEqual({
            valid: true,
            sample: { value: 72, timestamp: 1_000, mode: 'resting' },
        });
        expect(validateSample(20, 1_000, 'exercise').valid).toBe(true);
        expect(validateSample(300, 1_000, 'exercise').valid).toBe(true);
    });

    it('rejects readings outside [20, 300]', () => {
        expect(validateSample(19.9, 1_000, 'resting').valid).toBe(false);
        expect(validateSample(300.1, 1_000, 'resting').valid).toBe(false);
        expect(validateSample(0, 1_000, 'resting').valid).toBe(false);
    });

    it('rejects non-finite values', () => {
        const result = validateSample(Number.NaN, 1_000, 'resting');
        expect(result).toEqual({ valid: false, reason: 'Non-numeric heart rate: NaN' });
        expect(validateSample(Number.POSITIVE_INFINITY, 1_000, 'resting').valid).toBe(false);
    });

    it('rejects an invalid timestamp', () => {
        expect(validateSample(72, Number.NaN, 'resting')).toEqual({
            valid: false,
            reason: 'Invalid timestamp: NaN',
        });
    });
});
