import type { OverallStatus, PatternOutput, RhythmOutput, RiskOutput } from './types.js';

export function overallStatus(rhythm: RhythmOutput, risk: RiskOutput, pattern: PatternOutput): OverallStatus {
    if (rhythm.label === 'Irregular' || risk.label === 'High' || pattern.label === 'Irregular') {
        return 'Needs Attention';
    }

    if (risk.label === 'Medium' || pattern.label === 'High(Tachycardia)' || pattern.label === 'Low(Bradycardia)') {
        return 'Monitor';
    }

    return 'Healthy';
}
