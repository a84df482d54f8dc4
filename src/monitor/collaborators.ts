import type { Notification } from '../rules/types.js';
import type { AssessmentRecord } from '../scoring/types.js';
import type { SampleMode, TimeRange } from './types.js';

export interface RawSample {
    value: number;
    timestamp: number;
    mode: SampleMode;
}

export type SampleHandler = (reading: RawSample) => void;

/**
 * Source of heart-rate samples and of the slower ancillary aggregates.
 * Pull methods resolve to null when no reading exists in the range.
 */
export interface SensorSource {
    /** Rejects when the sensor is unavailable or access was refused. */
    requestAccess(): Promise<void>;
    /** Returns a function that cancels the subscription. */
    subscribe(handler: SampleHandler): () => void;
    latestRespiratoryRate(range: TimeRange): Promise<number | null>;
    latestActivityEnergy(range: TimeRange): Promise<number | null>;
    latestSleepRatio(range: TimeRange): Promise<number | null>;
    latestHeartRateVariability(range: TimeRange): Promise<number | null>;
}

export interface Notifier {
    dispatch(notification: Notification): Promise<void>;
}

export interface AssessmentRepository {
    save(record: AssessmentRecord): Promise<void>;
    /** Records from the last `daysBack` days, newest first. */
    query(daysBack: number): Promise<AssessmentRecord[]>;
}
