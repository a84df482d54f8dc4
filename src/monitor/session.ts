import { logger } from '../config/logger.js';
import { MonitorConfigurationError } from '../errors.js';
import { Metrics } from '../metrics/counter.js';
import { OfflineCache } from '../cache/offline-cache.js';
import { AlertEngine } from '../rules/engine.js';
import type { AlertDecision, AlertRules, AlertState, Notification } from '../rules/types.js';
import { DEFAULT_ANCILLARY, runAssessment, type AncillaryVitals } from '../scoring/ensemble.js';
import type { AssessmentRecord, CriticalSignal, UserProfile } from '../scoring/types.js';
import { BoundedChannel } from './channel.js';
import type { AssessmentRepository, Notifier, RawSample, SensorSource } from './collaborators.js';
import { RingBuffer } from './ring-buffer.js';
import { evaluatePeriodicRisk, type RiskEvaluation } from './risk-evaluator.js';
import type { Sample, SampleMode, TimeRange, Zone } from './types.js';
import { validateSample } from './validator.js';
import { classifyZone } from './zones.js';

const ANCILLARY_LOOKBACK_MS = 86_400_000;

export interface SessionOptions {
    rules: AlertRules;
    profile: UserProfile;
    ringCapacity: number;
    windowCapacity: number;
    channelCapacity: number;
    analysisIntervalMs: number;
    cooldownMs: number;
    estimatedMaxHr: number;
    now?: () => number;
}

export interface SessionDependencies {
    sensor: SensorSource;
    notifier: Notifier;
    repository: AssessmentRepository;
    cache: OfflineCache;
    metrics: Metrics;
}

export type SessionEvent =
    | { type: 'sample'; sample: Sample }
    | { type: 'zone'; zone: Zone; sample: Sample }
    | { type: 'alert'; decision: AlertDecision }
    | { type: 'risk'; evaluation: RiskEvaluation }
    | { type: 'assessment'; record: AssessmentRecord }
    | { type: 'critical'; assessmentId: string; signals: CriticalSignal[] };

export type SessionEventHandler = (event: SessionEvent) => void;

type ChannelMessage = { kind: 'sample'; sample: Sample } | { kind: 'tick' };

/**
 * One monitoring run: owns the ring buffer, the feature window and the alert
 * engine. Samples and analysis ticks are funnelled through one bounded channel
 * and handled by a single consumer, so buffer mutation is never interleaved.
 */
export class MonitoringSession {
    private readonly ring: RingBuffer<Sample>;
    private readonly window: RingBuffer<number>;
    private readonly engine: AlertEngine;
    private readonly now: () => number;
    private readonly listeners = new Set<SessionEventHandler>();
    private readonly pending = new Set<Promise<void>>();
    private cycle: Promise<void> = Promise.resolve();

    private channel: BoundedChannel<ChannelMessage> | null = null;
    private consumer: Promise<void> | null = null;
    private unsubscribe: (() => void) | null = null;
    private timer: ReturnType<typeof setInterval> | null = null;
    private starting: Promise<void> | null = null;
    private running = false;
    private generation = 0;

    private mode: SampleMode = 'resting';
    private zone: Zone | null = null;
    private latest: AssessmentRecord | null = null;

    constructor(
        private options: SessionOptions,
        private deps: SessionDependencies,
    ) {
        this.now = options.now ?? Date.now;
        this.ring = new RingBuffer<Sample>(options.ringCapacity);
        this.window = new RingBuffer<number>(options.windowCapacity);
        this.engine = new AlertEngine(options.rules, options.cooldownMs, this.now);
    }

    get isRunning(): boolean {
        return this.running;
    }

    /**
     * Request sensor access, subscribe to samples and start the analysis timer.
     * Calling it again while running is a no-op.
     */
    async start(): Promise<void> {
        if (this.running) return;
        if (!this.starting) {
            this.starting = this.open().finally(() => {
                this.starting = null;
            });
        }
        return this.starting;
    }

    /**
     * Cancel the subscription and the timer, wait for in-flight work and clear
     * both buffers. Safe to call repeatedly.
     */
    async stop(): Promise<void> {
        if (this.starting) {
            await this.starting.catch((err: unknown) => {
                logger.debug({ error: err }, 'Session stopped after a failed start');
            });
        }
        if (!this.running) return;

        this.running = false;
        this.generation++;

        this.unsubscribe?.();
        this.unsubscribe = null;

        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
        }

        this.channel?.close();
        this.channel = null;
        await this.consumer;
        this.consumer = null;
        await Promise.all([...this.pending]);

        this.ring.clear();
        this.window.clear();
        this.zone = null;

        logger.info('Monitoring session stopped');
    }

    on(handler: SessionEventHandler): () => void {
        this.listeners.add(handler);
        return () => {
            this.listeners.delete(handler);
        };
    }

    /**
     * Entry point for the sensor push path. Invalid readings are dropped here and
     * never reach a buffer. Returns whether the sample was accepted.
     */
    ingest(reading: RawSample): boolean {
        this.deps.metrics.increment('received');

        const result = validateSample(reading.value, reading.timestamp, reading.mode);
        if (!result.valid) {
            this.deps.metrics.increment('dropped_invalid');
            logger.debug({ reading, reason: result.reason }, 'Sample dropped');
            return false;
        }

        this.deps.metrics.increment('validated');
        return this.enqueue({ kind: 'sample', sample: result.sample });
    }

    /**
     * Assess the current feature window on demand. Resolves to null when the
     * window is empty or the session stops meanwhile.
     */
    async assess(): Promise<AssessmentRecord | null> {
        const values = this.window.toArray();
        if (values.length === 0) return null;
        return this.produceAssessment(values, this.generation);
    }

    latestAssessment(): AssessmentRecord | null {
        return this.latest ?? this.deps.cache.load();
    }

    currentZone(): Zone | null {
        return this.zone;
    }

    alertState(): AlertState {
        return this.engine.getState();
    }

    recentSamples(n: number): Sample[] {
        return this.ring.recent(n);
    }

    bufferSizes(): { ring: number; window: number } {
        return { ring: this.ring.length, window: this.window.length };
    }

    private async open(): Promise<void> {
        try {
            await this.deps.sensor.requestAccess();
        } catch (err) {
            logger.error({ error: err }, 'Sensor unavailable, monitoring not started');
            throw new MonitorConfigurationError('Heart-rate sensor unavailable or access denied', err);
        }

        const channel = new BoundedChannel<ChannelMessage>(this.options.channelCapacity);
        this.channel = channel;
        this.consumer = this.consume(channel).catch((err: unknown) => {
            logger.error({ error: err }, 'Session consumer failed');
        });

        try {
            this.unsubscribe = this.deps.sensor.subscribe((reading) => {
                this.ingest(reading);
            });
        } catch (err) {
            channel.close();
            this.channel = null;
            await this.consumer;
            this.consumer = null;
            logger.error({ error: err }, 'Sensor subscription failed, monitoring not started');
            throw new MonitorConfigurationError('Heart-rate sensor subscription failed', err);
        }
        this.timer = setInterval(() => {
            this.enqueue({ kind: 'tick' });
        }, this.options.analysisIntervalMs);

        this.running = true;
        logger.info(
            {
                ringCapacity: this.options.ringCapacity,
                windowCapacity: this.options.windowCapacity,
                analysisIntervalMs: this.options.analysisIntervalMs,
            },
            'Monitoring session started',
        );
    }

    private enqueue(message: ChannelMessage): boolean {
        if (!this.channel) return false;

        if (!this.channel.offer(message)) {
            this.deps.metrics.increment('dropped_overflow');
            logger.warn({ kind: message.kind, capacity: this.channel.capacity }, 'Channel full, message dropped');
            return false;
        }
        return true;
    }

    private async consume(channel: BoundedChannel<ChannelMessage>): Promise<void> {
        for await (const message of channel) {
            if (message.kind === 'sample') {
                this.handleSample(message.sample);
            } else {
                this.handleTick();
            }
        }
    }

    private handleSample(sample: Sample): void {
        this.ring.push(sample);
        this.window.push(sample.value);
        this.mode = sample.mode;
        this.emit({ type: 'sample', sample });

        this.zone = classifyZone(sample.value, sample.mode, this.options.estimatedMaxHr);
        this.emit({ type: 'zone', zone: this.zone, sample });

        const decision = this.engine.evaluate(sample, this.window.recent(this.options.rules.irregularity.window));
        this.handleDecision(decision);
    }

    private handleTick(): void {
        this.deps.metrics.increment('evaluations');
        const values = this.window.toArray();

        const evaluation = evaluatePeriodicRisk(values, this.mode, this.options.rules.periodic_risk);
        if (evaluation) {
            logger.debug({ score: evaluation.score, features: evaluation.features }, 'Periodic risk evaluated');
            this.emit({ type: 'risk', evaluation });

            if (evaluation.escalate) {
                this.handleDecision(this.engine.escalate(evaluation.score, this.mode));
            }
        }

        if (values.length > 0) {
            this.track(this.produceAssessment(values, this.generation));
        }
    }

    private handleDecision(decision: AlertDecision): void {
        if (decision.previous === decision.status && !decision.notification && !decision.suppressed) {
            return;
        }

        this.emit({ type: 'alert', decision });

        if (decision.notification) {
            this.dispatch(decision.notification);
        } else if (decision.suppressed) {
            this.deps.metrics.increment('notifications_suppressed');
        }
    }

    private dispatch(notification: Notification): void {
        this.deps.notifier.dispatch(notification).then(
            () => {
                this.deps.metrics.increment('notifications_dispatched');
            },
            (err: unknown) => {
                this.deps.metrics.increment('notifications_failed');
                logger.error({ error: err, title: notification.title }, 'Notification dispatch failed');
            },
        );
    }

    /**
     * Cycles run one after another in the order their windows were taken, so a
     * slow cycle can never overwrite a newer assessment.
     */
    private produceAssessment(values: number[], generation: number): Promise<AssessmentRecord | null> {
        const run = this.cycle.then(() => this.runCycle(values, generation));
        this.cycle = run.then(
            () => undefined,
            (err: unknown) => {
                logger.debug({ error: err }, 'Assessment cycle rejected');
            },
        );
        return run;
    }

    private async runCycle(values: number[], generation: number): Promise<AssessmentRecord | null> {
        const ancillary = await this.fetchAncillary();
        if (generation !== this.generation) {
            return null;
        }

        const record = runAssessment(values, ancillary, {
            profile: this.options.profile,
            now: () => new Date(this.now()),
        });
        const { assessment } = record;

        this.latest = record;
        this.deps.metrics.increment('assessments');
        logger.info(
            {
                assessmentId: assessment.id,
                overall: assessment.overallStatus,
                rhythm: assessment.rhythm.label,
                risk: assessment.risk.label,
                pattern: assessment.pattern.label,
            },
            'Assessment produced',
        );
        this.emit({ type: 'assessment', record });

        if (assessment.critical.length > 0) {
            this.surfaceCritical(assessment.id, assessment.critical);
        }

        this.deps.cache.store(record);
        await this.persist(record);

        return record;
    }

    /**
     * Critical signals bypass the alert engine and its cooldown. Each signal
     * gets its own notification.
     */
    private surfaceCritical(assessmentId: string, signals: CriticalSignal[]): void {
        this.deps.metrics.increment('critical_signals', signals.length);
        logger.warn({ assessmentId, codes: signals.map((s) => s.code) }, 'Critical condition detected');
        this.emit({ type: 'critical', assessmentId, signals });

        for (const signal of signals) {
            this.dispatch({ title: 'Critical Health Alert', body: signal.message, urgency: 'high' });
        }
    }

    private async persist(record: AssessmentRecord): Promise<void> {
        try {
            await this.deps.repository.save(record);
        } catch (err) {
            this.deps.metrics.increment('persist_failed');
            logger.error({ error: err, assessmentId: record.assessment.id }, 'Failed to persist assessment');
            this.deps.cache.enqueue(record);
            return;
        }

        const replayed = await this.deps.cache.replay((queued) => this.deps.repository.save(queued));
        if (replayed > 0) {
            this.deps.metrics.increment('persist_replayed', replayed);
        }
    }

    private async fetchAncillary(): Promise<AncillaryVitals> {
        const end = this.now();
        const range: TimeRange = { start: end - ANCILLARY_LOOKBACK_MS, end };
        const { sensor } = this.deps;

        const [respiratoryRate, activityLevel, sleepQuality, hrvMean] = await Promise.all([
            this.pull('respiratory rate', () => sensor.latestRespiratoryRate(range), DEFAULT_ANCILLARY.respiratoryRate),
            this.pull('activity energy', () => sensor.latestActivityEnergy(range), DEFAULT_ANCILLARY.activityLevel),
            this.pull('sleep ratio', () => sensor.latestSleepRatio(range), DEFAULT_ANCILLARY.sleepQuality),
            this.pull('heart rate variability', () => sensor.latestHeartRateVariability(range), DEFAULT_ANCILLARY.hrvMean),
        ]);

        return { respiratoryRate, activityLevel, sleepQuality, hrvMean };
    }

    private async pull(name: string, read: () => Promise<number | null>, fallback: number): Promise<number> {
        try {
            return (await read()) ?? fallback;
        } catch (err) {
            logger.warn({ error: err, metric: name }, 'Ancillary read failed, using default');
            return fallback;
        }
    }

    private track(task: Promise<unknown>): void {
        const tracked: Promise<void> = task.then(
            () => {
                this.pending.delete(tracked);
            },
            (err: unknown) => {
                this.pending.delete(tracked);
                logger.error({ error: err }, 'Assessment cycle failed');
            },
        );
        this.pending.add(tracked);
    }

    private emit(event: SessionEvent): void {
        for (const listener of this.listeners) {
            try {
                listener(event);
            } catch (err) {
                logger.error({ error: err, event: event.type }, 'Session listener threw');
            }
        }
    }
}
