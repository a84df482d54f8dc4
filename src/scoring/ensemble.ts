import { v4 as uuidv4 } from 'uuid';
import { windowFeatures } from '../monitor/statistics.js';
import { overallStatus } from './aggregator.js';
import { checkCriticalConditions } from './critical.js';
import { scoreFitness } from './fitness.js';
import { rrIntervalsFromHeartRates, scorePattern } from './pattern.js';
import { scoreRisk } from './risk.js';
import { scoreRhythm } from './rhythm.js';
import type { Assessment, AssessmentRecord, AssessmentSnapshot, UserProfile } from './types.js';

export interface AncillaryVitals {
    hrvMean: number;
    respiratoryRate: number;
    activityLevel: number;
    sleepQuality: number;
}

export const DEFAULT_ANCILLARY: AncillaryVitals = {
    hrvMean: 50,
    respiratoryRate: 16,
    activityLevel: 250,
    sleepQuality: 0.8,
};

export interface AssessmentOptions {
    profile: UserProfile;
    now?: () => Date;
    generateId?: () => string;
}

export function buildSnapshot(heartRates: readonly number[], ancillary: AncillaryVitals): AssessmentSnapshot {
    const features = windowFeatures(heartRates);

    return {
        meanHeartRate: features.mean,
        stdHeartRate: features.stdev,
        pnn50: features.pnn50,
        hrvMean: ancillary.hrvMean,
        respiratoryRate: ancillary.respiratoryRate,
        activityLevel: ancillary.activityLevel,
        sleepQuality: ancillary.sleepQuality,
        sampleCount: heartRates.length,
    };
}

/**
 * Run the critical pre-check and all four scorers over one consistent snapshot
 * of buffered heart rates, then aggregate. Pure apart from the id and timestamp.
 */
export function runAssessment(
    heartRates: readonly number[],
    ancillary: AncillaryVitals,
    options: AssessmentOptions,
): AssessmentRecord {
    const snapshot = buildSnapshot(heartRates, ancillary);

    const critical = checkCriticalConditions({
        heartRate: snapshot.meanHeartRate,
        activityLevel: snapshot.activityLevel,
        respiratoryRate: snapshot.respiratoryRate,
        hrvMean: snapshot.hrvMean,
    });

    const rhythm = scoreRhythm({
        meanHeartRate: snapshot.meanHeartRate,
        stdHeartRate: snapshot.stdHeartRate,
        pnn50: snapshot.pnn50,
    });

    const risk = scoreRisk({
        avgHeartRate: snapshot.meanHeartRate,
        hrvMean: snapshot.hrvMean,
        respiratoryRate: snapshot.respiratoryRate,
        activityLevel: snapshot.activityLevel,
        sleepRatio: snapshot.sleepQuality,
    });

    const pattern = scorePattern(rrIntervalsFromHeartRates(heartRates));

    const fitness = scoreFitness(
        {
            heartRates,
            meanHeartRate: snapshot.meanHeartRate,
            hrvMean: snapshot.hrvMean,
            sleepQuality: snapshot.sleepQuality,
        },
        options.profile,
    );

    const assessment: Assessment = {
        id: (options.generateId ?? uuidv4)(),
        rhythm,
        risk,
        pattern,
        fitness,
        overallStatus: overallStatus(rhythm, risk, pattern),
        critical,
        timestamp: (options.now ?? (() => new Date()))().toISOString(),
    };

    return { assessment: deepFreeze(assessment), snapshot: Object.freeze(snapshot) };
}

function deepFreeze<T extends object>(value: T): T {
    const children: unknown[] = Object.values(value);
    for (const child of children) {
        if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
            deepFreeze(child);
        }
    }
    return Object.freeze(value);
}
