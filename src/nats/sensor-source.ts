import { logger } from '../config/logger.js';
import { SchemaIds, SchemaValidator } from '../contracts/schema-validator.js';
import type { RawSample, SampleHandler, SensorSource } from '../monitor/collaborators.js';
import type { SampleMode, TimeRange } from '../monitor/types.js';
import type { MessageBus } from './connection.js';

export const HEART_RATE_SUBJECT = 'sensor.heart_rate.sampled';
export const ANCILLARY_SUBJECT = 'sensor.ancillary.reported';

export interface HeartRateSampledEvent {
    event_name: typeof HEART_RATE_SUBJECT;
    event_id: string;
    timestamp: string;
    payload: {
        heart_rate: number;
        mode: SampleMode;
        timestamp: string;
    };
}

export interface AncillaryReportedEvent {
    event_name: typeof ANCILLARY_SUBJECT;
    event_id: string;
    timestamp: string;
    payload: {
        respiratory_rate?: number;
        activity_energy?: number;
        sleep_ratio?: number;
        hrv_mean?: number;
        timestamp: string;
    };
}

type AncillaryMetric = 'respiratory_rate' | 'activity_energy' | 'sleep_ratio' | 'hrv_mean';

interface Reading {
    value: number;
    at: number;
}

const ANCILLARY_METRICS: readonly AncillaryMetric[] = ['respiratory_rate', 'activity_energy', 'sleep_ratio', 'hrv_mean'];

/**
 * Sensor fed by NATS events. Heart-rate samples are pushed to the subscriber;
 * ancillary aggregates are remembered per metric and served by the pull methods.
 */
export class NatsSensorSource implements SensorSource {
    private readonly latest = new Map<AncillaryMetric, Reading>();
    private ancillaryUnsubscribe: (() => void) | null = null;

    constructor(
        private bus: MessageBus,
        private validator: SchemaValidator,
    ) { }

    async requestAccess(): Promise<void> {
        if (!this.bus.isConnected()) {
            throw new Error('Sensor bus is not connected');
        }

        if (!this.ancillaryUnsubscribe) {
            this.ancillaryUnsubscribe = this.bus.subscribe(ANCILLARY_SUBJECT, (data) => this.handleAncillary(data));
        }
    }

    subscribe(handler: SampleHandler): () => void {
        return this.bus.subscribe(HEART_RATE_SUBJECT, (data) => {
            const reading = this.toRawSample(data);
            if (reading) {
                handler(reading);
            }
        });
    }

    close(): void {
        this.ancillaryUnsubscribe?.();
        this.ancillaryUnsubscribe = null;
    }

    async latestRespiratoryRate(range: TimeRange): Promise<number | null> {
        return this.read('respiratory_rate', range);
    }

    async latestActivityEnergy(range: TimeRange): Promise<number | null> {
        return this.read('activity_energy', range);
    }

    async latestSleepRatio(range: TimeRange): Promise<number | null> {
        return this.read('sleep_ratio', range);
    }

    async latestHeartRateVariability(range: TimeRange): Promise<number | null> {
        return this.read('hrv_mean', range);
    }

    private toRawSample(data: unknown): RawSample | null {
        if (!this.validator.is<HeartRateSampledEvent>(SchemaIds.heartRateSampled, data)) {
            const { errors } = this.validator.validateHeartRateSampled(data);
            logger.warn({ errors }, 'Heart-rate event failed schema validation');
            return null;
        }

        const { heart_rate, mode, timestamp } = data.payload;
        return { value: heart_rate, mode, timestamp: Date.parse(timestamp) };
    }

    private handleAncillary(data: unknown): void {
        if (!this.validator.is<AncillaryReportedEvent>(SchemaIds.ancillaryReported, data)) {
            const { errors } = this.validator.validateAncillaryReported(data);
            logger.warn({ errors }, 'Ancillary event failed schema validation');
            return;
        }

        const { payload } = data;
        const at = Date.parse(payload.timestamp);

        for (const metric of ANCILLARY_METRICS) {
            const value = payload[metric];
            if (value === undefined) continue;

            const previous = this.latest.get(metric);
            if (!previous || previous.at <= at) {
                this.latest.set(metric, { value, at });
            }
        }
    }

    private read(metric: AncillaryMetric, range: TimeRange): number | null {
        const reading = this.latest.get(metric);
        if (!reading || reading.at < range.start || reading.at > range.end) {
            return null;
        }
        return reading.value;
    }
}
