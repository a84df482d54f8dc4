import { estimatedMaxHeartRate } from '../monitor/zones.js';
import { clamp, clampHeartRate, clampHrv, clampSleepRatio } from './bounds.js';
import type { FitnessCategory, FitnessOutput, UserProfile } from './types.js';

export interface FitnessLevelInputs {
    age: number;
    restingHeartRate: number;
    /** One-minute heart-rate recovery, bpm */
    hrr1min: number;
    rmssd: number;
    recoveryEfficiency: number;
}

export interface FitnessInputs {
    heartRates: readonly number[];
    meanHeartRate: number;
    hrvMean: number;
    sleepQuality: number;
}

export interface BandedScore {
    score: number;
    status: string;
    advice: string;
}

export function fitnessCategory(score: number): FitnessCategory {
    if (score > 80) return 'Excellent';
    if (score > 65) return 'Good';
    if (score > 45) return 'Fair';
    if (score > 30) return 'Below Average';
    return 'Needs Improvement';
}

/**
 * Additive fitness score starting at 50. Heart-rate recovery has the strongest weight.
 */
export function predictFitnessLevel(inputs: FitnessLevelInputs): { score: number; category: FitnessCategory } {
    const { age, restingHeartRate: rhr, hrr1min, rmssd, recoveryEfficiency } = inputs;
    let score = 50;

    if (hrr1min > 30) score += 25;
    else if (hrr1min > 25) score += 18;
    else if (hrr1min > 20) score += 10;
    else if (hrr1min > 15) score += 5;
    else if (hrr1min < 12) score -= 20;

    if (rhr < 50) score += 18;
    else if (rhr < 55) score += 12;
    else if (rhr < 65) score += 6;
    else if (rhr > 85) score -= 20;
    else if (rhr > 75) score -= 12;

    if (rmssd > 60) score += 12;
    else if (rmssd > 40) score += 6;
    else if (rmssd < 20) score -= 10;

    if (age < 30) score += 8;
    else if (age < 40) score += 4;
    else if (age > 70) score -= 10;
    else if (age > 60) score -= 5;

    score += recoveryEfficiency * 0.15;
    score = clamp(score, 10, 95);

    return { score, category: fitnessCategory(score) };
}

export function estimateVo2max(
    age: number,
    restingHeartRate: number,
    maxHeartRate: number,
    hrReserve: number,
    fitnessScore: number,
): number {
    const base = 15.3 * (maxHeartRate / restingHeartRate);
    const fitnessAdjustment = fitnessScore * 0.35;
    const ageAdjustment = Math.max(0, (35 - age) * 0.25);
    const reserveAdjustment = hrReserve * 0.08;

    return clamp(base + fitnessAdjustment + ageAdjustment + reserveAdjustment, 15, 75);
}

export function describeAgeDifference(cardiovascularAge: number, chronologicalAge: number): string {
    const difference = cardiovascularAge - chronologicalAge;
    const years = Math.trunc(Math.abs(difference));

    if (difference < -2) return `${years} years younger`;
    if (difference > 2) return `${years} years older`;
    return 'Age appropriate';
}

export function cardiovascularAge(
    chronologicalAge: number,
    fitnessScore: number,
    restingHeartRate: number,
    hrr1min: number,
    rmssd: number,
): { age: number; comparison: string } {
    let age = chronologicalAge + (fitnessScore - 50) * -0.4;

    if (hrr1min > 30) age -= 7;
    else if (hrr1min > 25) age -= 4;
    else if (hrr1min > 20) age -= 2;
    else if (hrr1min < 12) age += 10;
    else if (hrr1min < 15) age += 5;

    if (restingHeartRate < 55) age -= 4;
    else if (restingHeartRate < 60) age -= 2;
    else if (restingHeartRate > 85) age += 6;
    else if (restingHeartRate > 75) age += 3;

    if (rmssd > 50) age -= 3;
    else if (rmssd > 35) age -= 1;
    else if (rmssd < 20) age += 4;

    age = clamp(age, 18, 90);

    return { age, comparison: describeAgeDifference(age, chronologicalAge) };
}

const RECOVERY_BANDS: ReadonlyArray<[number, string, string]> = [
    [85, 'Excellent Recovery', 'Your cardiovascular recovery is elite level. Maintain current training intensity.'],
    [70, 'Very Good Recovery', 'Recovery is strong. You can handle high-intensity interval training.'],
    [55, 'Good Recovery', 'Recovery is healthy. Consider adding interval training 2-3x per week.'],
    [40, 'Fair Recovery', 'Recovery needs improvement. Focus on aerobic base building and ensure adequate rest.'],
    [25, 'Below Average Recovery', 'Recovery is concerning. Reduce training intensity and prioritize recovery days.'],
];

const READINESS_BANDS: ReadonlyArray<[number, string, string]> = [
    [85, 'Peak Performance Ready', 'Your body is primed for maximum effort. Good day for personal records or competitions.'],
    [70, 'Ready for High Intensity', 'Great day for challenging workouts, intervals, or strength training.'],
    [55, 'Ready for Moderate Activity', 'Good for steady-state cardio, technique work, or moderate strength training.'],
    [40, 'Light Activity Recommended', 'Focus on recovery activities: easy walking, yoga, or stretching.'],
    [25, 'Recovery Priority', 'Your body needs rest. Consider meditation, light stretching, or complete rest.'],
];

function band(score: number, bands: ReadonlyArray<[number, string, string]>, fallback: [string, string]): BandedScore {
    for (const [threshold, status, advice] of bands) {
        if (score > threshold) {
            return { score, status, advice };
        }
    }
    return { score, status: fallback[0], advice: fallback[1] };
}

/**
 * Weighted recovery efficiency: 50% one-minute recovery, 30% two-minute recovery,
 * 20% time to reach the target rate (seconds).
 */
export function analyzeRecoveryPattern(hrr1min: number, hrr2min: number, timeToTarget: number): BandedScore {
    const hrr1Score = Math.min((hrr1min / 30) * 50, 50);
    const hrr2Score = Math.min((hrr2min / 50) * 30, 30);
    const timeScore = Math.max(0, ((180 - timeToTarget) / 180) * 20);
    const efficiency = clamp(hrr1Score + hrr2Score + timeScore, 0, 100);

    return band(efficiency, RECOVERY_BANDS, [
        'Poor Recovery',
        'Recovery needs immediate attention. Consult a healthcare provider and focus on gentle activity.',
    ]);
}

export function assessTrainingReadiness(
    rmssd: number,
    restingHeartRate: number,
    restingHeartRateBaseline: number,
    sleepQuality: number,
): BandedScore {
    let score = 50;

    if (rmssd > 60) score += 25;
    else if (rmssd > 45) score += 15;
    else if (rmssd > 30) score += 8;
    else if (rmssd < 20) score -= 25;
    else if (rmssd < 25) score -= 10;

    const elevation = restingHeartRate - restingHeartRateBaseline;
    if (elevation < -2) score += 10;
    else if (elevation < 2) score += 5;
    else if (elevation > 10) score -= 30;
    else if (elevation > 5) score -= 15;

    score += (sleepQuality - 0.5) * 40;
    score = clamp(score, 0, 100);

    return band(score, READINESS_BANDS, [
        'Rest Required',
        'Strong signs of fatigue or stress. Take a complete rest day and prioritize sleep.',
    ]);
}

/**
 * One-minute recovery estimated from the spread of recent heart rates.
 * A true measurement needs a post-exercise recording, which the stream does not mark.
 */
export function estimateHrr1Min(heartRates: readonly number[]): number {
    if (heartRates.length === 0) return 20;

    const range = Math.max(...heartRates) - Math.min(...heartRates);
    if (range > 40) return 25;
    if (range > 25) return 20;
    return 15;
}

export function recoveryEfficiencyBonus(hrr1min: number, hrr2min: number): number {
    const hrr1Score = Math.min((hrr1min / 30) * 50, 50);
    const hrr2Score = Math.min((hrr2min / 50) * 30, 30);
    return hrr1Score + hrr2Score + 20;
}

export function personalizedRecommendation(fitness: number, recovery: number, readiness: number): string {
    const recommendations: string[] = [];

    if (fitness < 40) {
        recommendations.push('Focus on building aerobic base with 30-min daily walks');
    } else if (fitness < 60) {
        recommendations.push('Add 2-3 cardio sessions per week to improve fitness');
    } else if (fitness > 75) {
        recommendations.push('Maintain excellence with varied training intensities');
    }

    if (recovery < 50) {
        recommendations.push('Prioritize recovery with proper sleep and nutrition');
    } else if (recovery > 70) {
        recommendations.push('Recovery is strong - you can increase training volume');
    }

    if (readiness < 40) {
        recommendations.push('Take a rest day or do light recovery activities');
    } else if (readiness > 70) {
        recommendations.push('Perfect timing for challenging workouts');
    }

    return recommendations.join('. ');
}

export function scoreFitness(inputs: FitnessInputs, profile: UserProfile): FitnessOutput {
    const age = profile.age;
    const restingHeartRate = clampHeartRate(inputs.meanHeartRate);
    const maxHeartRate = estimatedMaxHeartRate(age);
    const hrReserve = maxHeartRate - restingHeartRate;
    const rmssd = clampHrv(inputs.hrvMean);
    const sleep = clampSleepRatio(inputs.sleepQuality);
    const hrr1min = estimateHrr1Min(inputs.heartRates);
    const hrr2min = hrr1min * 1.5;

    const fitness = predictFitnessLevel({
        age,
        restingHeartRate,
        hrr1min,
        rmssd,
        recoveryEfficiency: recoveryEfficiencyBonus(hrr1min, hrr2min),
    });
    const vo2max = estimateVo2max(age, restingHeartRate, maxHeartRate, hrReserve, fitness.score);
    const cvAge = cardiovascularAge(age, fitness.score, restingHeartRate, hrr1min, rmssd);
    const recovery = analyzeRecoveryPattern(hrr1min, hrr2min, 120);
    const readiness = assessTrainingReadiness(
        rmssd,
        restingHeartRate,
        profile.restingHeartRateBaseline ?? restingHeartRate - 2,
        sleep,
    );

    return {
        fitnessScore: fitness.score,
        category: fitness.category,
        vo2max,
        cardiovascularAge: cvAge.age,
        ageComparison: cvAge.comparison,
        recoveryEfficiency: recovery.score,
        recoveryStatus: recovery.status,
        recoveryRecommendation: recovery.advice,
        trainingReadiness: readiness.score,
        readinessStatus: readiness.status,
        readinessGuidance: readiness.advice,
        recommendation: personalizedRecommendation(fitness.score, recovery.score, readiness.score),
    };
}
