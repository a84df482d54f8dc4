function clamp(value: number, min: number, max: number): number {
    if (Number.isNaN(value)) return min;
    return Math.max(min, Math.min(max, value));
}

export const clampHeartRate = (hr: number): number => clamp(hr, 30, 250);
export const clampHrv = (hrv: number): number => clamp(hrv, 0, 200);
export const clampRespiratoryRate = (rate: number): number => clamp(rate, 8, 30);
export const clampActivity = (kcal: number): number => clamp(kcal, 0, 1000);
export const clampSleepRatio = (ratio: number): number => clamp(ratio, 0, 1);
export const clampHeartRateStd = (std: number): number => clamp(std, 0, 100);
export const clampRatio = (ratio: number): number => clamp(ratio, 0, 1);

/**
 * Confidence is reported in [0, 1] whatever the arithmetic produced; NaN maps to 0.
 */
export const clampConfidence = (confidence: number): number => clamp(confidence, 0, 1);

export { clamp };
