import { windowFeatures } from './statistics.js';
import type { SampleMode, WindowFeatures } from './types.js';
import type { AlertRules } from '../rules/types.js';

export interface RiskEvaluation {
    features: WindowFeatures;
    score: number;
    sampleCount: number;
    /** True when the score exceeds the configured threshold and the alert engine must escalate. */
    escalate: boolean;
}

export function coarseRiskScore(features: WindowFeatures, mode: SampleMode): number {
    let score = 0;

    if (features.mean > 100 && mode !== 'exercise') score += 0.3;
    if (features.stdev > 20) score += 0.3;
    if (features.pnn50 < 0.05) score += 0.4;

    return Math.max(0, Math.min(score, 1));
}

/**
 * Periodic analysis over the feature window. Returns null while the window is
 * shorter than the configured minimum.
 */
export function evaluatePeriodicRisk(
    window: readonly number[],
    mode: SampleMode,
    rules: AlertRules['periodic_risk'],
): RiskEvaluation | null {
    if (window.length < rules.min_samples) {
        return null;
    }

    const features = windowFeatures(window);
    const score = coarseRiskScore(features, mode);

    return {
        features,
        score,
        sampleCount: window.length,
        escalate: score > rules.score_threshold,
    };
}
