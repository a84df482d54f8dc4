import { mean, rmssd, stdev } from '../monitor/statistics.js';
import { clampConfidence, clampHeartRate } from './bounds.js';
import type { PatternLabel, PatternOutput } from './types.js';

export const MIN_PATTERN_SAMPLES = 5;
export const MIN_IRREGULAR_SAMPLES = 20;

/**
 * Millisecond beat intervals equivalent to each heart-rate sample.
 */
export function rrIntervalsFromHeartRates(heartRates: readonly number[]): number[] {
    return heartRates.filter((hr) => Number.isFinite(hr)).map((hr) => 60000 / clampHeartRate(hr));
}

function result(label: PatternLabel, confidence: number): PatternOutput {
    return { label, confidence: clampConfidence(confidence) };
}

/**
 * Classify the interval pattern. Rules are evaluated in order; the first match wins.
 */
export function scorePattern(rrIntervals: readonly number[]): PatternOutput {
    const intervals = rrIntervals.filter((rr) => Number.isFinite(rr) && rr > 0);

    if (intervals.length < MIN_PATTERN_SAMPLES) {
        return result('Insufficient Data', 0);
    }

    const meanRR = mean(intervals);
    const stdRR = stdev(intervals);
    const successive = rmssd(intervals);
    const heartRate = 60000 / meanRR;

    if (heartRate < 45) {
        return result('Low(Bradycardia)', 0.9);
    }
    if (heartRate > 110) {
        return result('High(Tachycardia)', 0.92);
    }
    if (intervals.length >= MIN_IRREGULAR_SAMPLES && (stdRR > 200 || successive > 150)) {
        return result('Irregular', 0.95);
    }
    if (heartRate >= 60 && heartRate <= 100 && stdRR <= 100) {
        return result('Normal', 0.88);
    }
    return result('Variable', 0.75);
}
