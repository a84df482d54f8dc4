import {
    clampActivity,
    clampConfidence,
    clampHeartRate,
    clampHrv,
    clampRespiratoryRate,
    clampSleepRatio,
} from './bounds.js';
import type { RiskOutput } from './types.js';

export interface RiskInputs {
    avgHeartRate: number;
    hrvMean: number;
    respiratoryRate: number;
    activityLevel: number;
    sleepRatio: number;
}

export function stressIndicator(avgHeartRate: number): number {
    return 1 / (1 + Math.exp(-0.1 * (clampHeartRate(avgHeartRate) - 75)));
}

export function recoveryScore(sleepRatio: number, hrvMean: number): number {
    return (clampSleepRatio(sleepRatio) * clampHrv(hrvMean)) / 50;
}

export function riskScore(inputs: RiskInputs): number {
    const hr = clampHeartRate(inputs.avgHeartRate);
    const resp = clampRespiratoryRate(inputs.respiratoryRate);
    const activity = clampActivity(inputs.activityLevel);
    const sleep = clampSleepRatio(inputs.sleepRatio);
    const stress = stressIndicator(hr);
    const recovery = recoveryScore(sleep, inputs.hrvMean);

    let score = 0;

    // Recovery carries the largest weight
    if (recovery < 0.5) {
        score += 0.4;
    } else if (recovery < 0.8) {
        score += 0.2;
    }

    if (activity < 100) score += 0.2;
    if (stress > 0.7) score += 0.1;
    if (sleep < 0.5) score += 0.1;
    if (resp > 20 || resp < 12) score += 0.1;
    if (hr > 90 && activity < 200) score += 0.1;

    return score;
}

/**
 * Three-tier health risk from heart rate, HRV, respiration, activity and sleep.
 */
export function scoreRisk(inputs: RiskInputs): RiskOutput {
    const score = riskScore(inputs);

    if (score >= 0.6) {
        return { label: 'High', confidence: clampConfidence(Math.min(score + 0.2, 0.95)) };
    }
    if (score >= 0.35) {
        return { label: 'Medium', confidence: clampConfidence(0.75 + (score - 0.35) * 0.5) };
    }
    return { label: 'Low', confidence: clampConfidence(Math.max(0.85 - score, 0.7)) };
}
