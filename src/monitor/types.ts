export type SampleMode = 'resting' | 'exercise';

export interface Sample {
    value: number;
    /** Epoch milliseconds as reported by the sensor. */
    timestamp: number;
    mode: SampleMode;
}

export type RestingZone = 'Low' | 'Resting' | 'Normal' | 'Elevated' | 'High';
export type ExerciseZone = 'Resting' | 'Warm Up' | 'Fat Burn' | 'Cardio' | 'Peak' | 'Maximum';
export type Zone = RestingZone | ExerciseZone;

export interface WindowFeatures {
    mean: number;
    stdev: number;
    pnn50: number;
}

export interface TimeRange {
    start: number;
    end: number;
}
