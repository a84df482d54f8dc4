import type { CriticalSignal } from './types.js';

export interface CriticalInputs {
    heartRate: number;
    activityLevel: number;
    respiratoryRate: number;
    hrvMean: number;
}

/**
 * Fast-path safety gate. Independent of the ensemble; every matching condition
 * is reported, in a fixed order.
 */
export function checkCriticalConditions(inputs: CriticalInputs): CriticalSignal[] {
    const { heartRate, activityLevel, respiratoryRate, hrvMean } = inputs;
    const signals: CriticalSignal[] = [];

    if (heartRate > 150 && activityLevel < 100) {
        signals.push({
            code: 'HIGH_RESTING_HEART_RATE',
            message: 'Dangerously high resting heart rate detected. Seek immediate medical attention.',
        });
    }

    if (heartRate < 40) {
        signals.push({
            code: 'LOW_HEART_RATE',
            message: 'Dangerously low heart rate detected. Seek immediate medical attention.',
        });
    }

    if (respiratoryRate > 25 || respiratoryRate < 8) {
        signals.push({
            code: 'ABNORMAL_RESPIRATORY_RATE',
            message: 'Abnormal respiratory rate detected. Consider medical consultation.',
        });
    }

    if (hrvMean < 10 && heartRate > 80) {
        signals.push({
            code: 'LOW_HRV_ELEVATED_HEART_RATE',
            message: 'Very low heart rate variability with elevated heart rate. Medical evaluation recommended.',
        });
    }

    return signals;
}
