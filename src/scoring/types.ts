export interface ModelOutput {
    label: string;
    /** Always within [0, 1]. */
    confidence: number;
}

export type RhythmLabel = 'Normal' | 'Irregular';
export type RiskLabel = 'Low' | 'Medium' | 'High';
export type PatternLabel =
    | 'Insufficient Data'
    | 'Low(Bradycardia)'
    | 'High(Tachycardia)'
    | 'Irregular'
    | 'Normal'
    | 'Variable';

export interface RhythmOutput extends ModelOutput {
    label: RhythmLabel;
}

export interface RiskOutput extends ModelOutput {
    label: RiskLabel;
}

export interface PatternOutput extends ModelOutput {
    label: PatternLabel;
}

export type FitnessCategory = 'Excellent' | 'Good' | 'Fair' | 'Below Average' | 'Needs Improvement';

export interface FitnessOutput {
    fitnessScore: number;
    category: FitnessCategory;
    vo2max: number;
    cardiovascularAge: number;
    ageComparison: string;
    recoveryEfficiency: number;
    recoveryStatus: string;
    recoveryRecommendation: string;
    trainingReadiness: number;
    readinessStatus: string;
    readinessGuidance: string;
    recommendation: string;
}

export type OverallStatus = 'Healthy' | 'Monitor' | 'Needs Attention';

export type CriticalCode =
    | 'HIGH_RESTING_HEART_RATE'
    | 'LOW_HEART_RATE'
    | 'ABNORMAL_RESPIRATORY_RATE'
    | 'LOW_HRV_ELEVATED_HEART_RATE';

export interface CriticalSignal {
    code: CriticalCode;
    message: string;
}

/**
 * Inputs an assessment was computed from. Persisted next to the assessment.
 */
export interface AssessmentSnapshot {
    meanHeartRate: number;
    stdHeartRate: number;
    pnn50: number;
    hrvMean: number;
    respiratoryRate: number;
    activityLevel: number;
    sleepQuality: number;
    sampleCount: number;
}

export interface Assessment {
    id: string;
    rhythm: RhythmOutput;
    risk: RiskOutput;
    pattern: PatternOutput;
    fitness: FitnessOutput;
    overallStatus: OverallStatus;
    critical: CriticalSignal[];
    /** ISO 8601 */
    timestamp: string;
}

export interface AssessmentRecord {
    assessment: Assessment;
    snapshot: AssessmentSnapshot;
}

export interface UserProfile {
    age: number;
    /** Personal resting heart-rate baseline; defaults to two beats below the current resting rate. */
    restingHeartRateBaseline?: number;
}
