import type { WindowFeatures } from './types.js';

/** Successive differences above this many bpm count towards the pNN50-like ratio. */
export const PNN50_THRESHOLD_BPM = 50 / 60;

export function mean(values: readonly number[]): number {
    if (values.length === 0) return 0;
    return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Population standard deviation.
 */
export function stdev(values: readonly number[]): number {
    if (values.length === 0) return 0;
    const m = mean(values);
    const variance = values.reduce((sum, v) => sum + (v - m) ** 2, 0) / values.length;
    return Math.sqrt(variance);
}

export function successiveDifferences(values: readonly number[]): number[] {
    const diffs: number[] = [];
    for (let i = 1; i < values.length; i++) {
        diffs.push(values[i] - values[i - 1]);
    }
    return diffs;
}

/**
 * Fraction of successive absolute differences exceeding the threshold.
 * Derived from heart-rate samples, so it is only a proxy for the interval-based pNN50.
 */
export function pnn50Like(values: readonly number[], threshold = PNN50_THRESHOLD_BPM): number {
    const diffs = successiveDifferences(values);
    if (diffs.length === 0) return 0;
    return diffs.filter((d) => Math.abs(d) > threshold).length / diffs.length;
}

/**
 * Root mean square of successive differences.
 */
export function rmssd(values: readonly number[]): number {
    const diffs = successiveDifferences(values);
    if (diffs.length === 0) return 0;
    return Math.sqrt(diffs.reduce((sum, d) => sum + d * d, 0) / diffs.length);
}

export function windowFeatures(values: readonly number[]): WindowFeatures {
    return {
        mean: mean(values),
        stdev: stdev(values),
        pnn50: pnn50Like(values),
    };
}
