import type { ExerciseZone, RestingZone, SampleMode, Zone } from './types.js';

export const DEFAULT_ESTIMATED_MAX_HR = 190;

const SEVERITY: Record<Zone, number> = {
    Low: 0,
    Resting: 1,
    Normal: 2,
    Elevated: 3,
    High: 4,
    'Warm Up': 2,
    'Fat Burn': 3,
    Cardio: 4,
    Peak: 5,
    Maximum: 6,
};

/**
 * Age-predicted maximum heart rate.
 */
export function estimatedMaxHeartRate(age: number): number {
    return 220 - age;
}

export function restingZone(value: number): RestingZone {
    if (value < 50) return 'Low';
    if (value < 60) return 'Resting';
    if (value < 100) return 'Normal';
    if (value < 120) return 'Elevated';
    return 'High';
}

export function exerciseZone(value: number, estimatedMaxHr = DEFAULT_ESTIMATED_MAX_HR): ExerciseZone {
    const pct = (value / estimatedMaxHr) * 100;

    if (pct < 50) return 'Resting';
    if (pct < 60) return 'Warm Up';
    if (pct < 70) return 'Fat Burn';
    if (pct < 80) return 'Cardio';
    if (pct < 90) return 'Peak';
    return 'Maximum';
}

export function classifyZone(value: number, mode: SampleMode, estimatedMaxHr = DEFAULT_ESTIMATED_MAX_HR): Zone {
    return mode === 'exercise' ? exerciseZone(value, estimatedMaxHr) : restingZone(value);
}

/**
 * Ordering of zones within a mode; higher is more intense.
 */
export function zoneSeverity(zone: Zone): number {
    return SEVERITY[zone];
}
