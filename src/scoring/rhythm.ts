import { clampConfidence, clampHeartRate, clampHeartRateStd, clampRatio } from './bounds.js';
import type { RhythmOutput } from './types.js';

export interface RhythmInputs {
    meanHeartRate: number;
    stdHeartRate: number;
    pnn50: number;
}

export function irregularityScore({ meanHeartRate, stdHeartRate, pnn50 }: RhythmInputs): number {
    const hr = clampHeartRate(meanHeartRate);
    const std = clampHeartRateStd(stdHeartRate);
    const ratio = clampRatio(pnn50);

    let score = 0;

    if (std > 15) {
        score += 0.4;
    } else if (std > 10) {
        score += 0.2;
    }

    // Low variability ratio while the rate is raised
    if (ratio < 0.1 && hr > 85) score += 0.3;

    if (hr > 100 || hr < 50) score += 0.2;

    if (std > 12 && ratio < 0.08) score += 0.1;

    return score;
}

/**
 * Rhythm regularity from windowed heart-rate statistics.
 */
export function scoreRhythm(inputs: RhythmInputs): RhythmOutput {
    const score = irregularityScore(inputs);

    if (score >= 0.5) {
        return { label: 'Irregular', confidence: clampConfidence(Math.min(score, 0.95)) };
    }
    return { label: 'Normal', confidence: clampConfidence(Math.max(1 - score, 0.7)) };
}
