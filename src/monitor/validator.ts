import type { Sample, SampleMode } from './types.js';

export const MIN_VALID_HEART_RATE = 20;
export const MAX_VALID_HEART_RATE = 300;

export type SampleValidation =
    | { valid: true; sample: Sample }
    | { valid: false; reason: string };

/**
 * Reject physiologically impossible readings before they reach any buffer.
 */
export function validateSample(value: number, timestamp: number, mode: SampleMode): SampleValidation {
    if (!Number.isFinite(value)) {
        return { valid: false, reason: `Non-numeric heart rate: ${value}` };
    }

    if (value < MIN_VALID_HEART_RATE || value > MAX_VALID_HEART_RATE) {
        return {
            valid: false,
            reason: `Heart rate ${value} outside [${MIN_VALID_HEART_RATE}, ${MAX_VALID_HEART_RATE}]`,
        };
    }

    if (!Number.isFinite(timestamp)) {
        return { valid: false, reason: `Invalid timestamp: ${timestamp}` };
    }

    return { valid: true, sample: { value, timestamp, mode } };
}
