import { describe, it, expect, beforeEach } from 'vitest';
import { AlertEngine } from '../../../src/rules/engine.js';
import { DEFAULT_ALERT_RULES } from '../../../src/rules/types.js';
import type { Sample, SampleMode } from '../../../src/monitor/types.js';

const COOLDOWN_MS = 300_000;

describe('AlertEngine', () => {
    let clock: number;
    let engine: AlertEngine;

    const sample = (value: number, mode: SampleMode = 'resting'): Sample => ({ value, timestamp: clock, mode });

    beforeEach(() => {
        clock = 1_700_000_000_000;
        engine = new AlertEngine(DEFAULT_ALERT_RULES, COOLDOWN_MS, () => clock);
    });

    describe('resting thresholds', () => {
        it('stays normal without notifying for an in-range value', () => {
            const decision = engine.evaluate(sample(72), []);

            expect(decision).toEqual({
                previous: 'normal',
                status: 'normal',
                trigger: 'sample',
                mode: 'resting',
                suppressed: false,
            });
        });

        it('goes critical above the high threshold', () => {
            const decision = engine.evaluate(sample(110.7), []);

            expect(decision.status).toBe('critical');
            expect(decision.notification).toEqual({
                title: 'High Resting Heart Rate',
                body: 'Your resting heart rate is 110 bpm. This may require attention.',
                urgency: 'high',
            });
            expect(engine.getState()).toEqual({ status: 'critical', lastNotifiedAt: clock });
        });

        it('warns below the low threshold', () => {
            const decision = engine.evaluate(sample(45), []);

            expect(decision.status).toBe('warning');
            expect(decision.notification).toEqual({
                title: 'Low Heart Rate Detected',
                body: 'Your heart rate is 45 bpm. Monitor for symptoms.',
                urgency: 'medium',
            });
        });

        it('treats the thresholds themselves as normal', () => {
            expect(engine.evaluate(sample(100), []).status).toBe('normal');
            expect(engine.evaluate(sample(50), []).status).toBe('normal');
        });
    });

    describe('exercise thresholds', () => {
        it('warns only above the exercise threshold', () => {
            expect(engine.evaluate(sample(170, 'exercise'), []).status).toBe('normal');

            const decision = engine.evaluate(sample(185, 'exercise'), []);
            expect(decision.status).toBe('warning');
            expect(decision.notification).toEqual({
                title: 'High Heart Rate During Exercise',
                body: 'Your heart rate is 185 bpm. Consider reducing intensity.',
                urgency: 'medium',
            });
        });

        it('does not flag a low exercise value', () => {
            expect(engine.evaluate(sample(45, 'exercise'), []).status).toBe('normal');
        });
    });

    describe('irregularity overlay', () => {
        const jagged = [50, 110, 50, 110, 50, 110, 50, 110, 50, 110];

        it('moves to monitoring when the recent spread is wide', () => {
            const decision = engine.evaluate(sample(80), jagged);

            expect(decision.status).toBe('monitoring');
            expect(decision.trigger).toBe('irregularity');
            expect(decision.notification?.title).toBe('Irregular Heart Rhythm Detected');
            expect(decision.notification?.urgency).toBe('medium');
        });

        it('needs a full irregularity window', () => {
            expect(engine.evaluate(sample(80), jagged.slice(1)).status).toBe('normal');
        });

        it('is not applied during exercise', () => {
            expect(engine.evaluate(sample(80, 'exercise'), jagged).status).toBe('normal');
        });
    });

    describe('cooldown', () => {
        it('changes state but suppresses the notification within the cooldown', () => {
            engine.evaluate(sample(110), []);
            clock += 1_000;
            engine.evaluate(sample(72), []);
            clock += 1_000;

            const decision = engine.evaluate(sample(45), []);

            expect(decision.status).toBe('warning');
            expect(decision.suppressed).toBe(true);
            expect(decision.notification).toBeUndefined();
            expect(engine.getState().status).toBe('warning');
        });

        it('notifies again once the cooldown has fully elapsed', () => {
            const first = clock;
            engine.evaluate(sample(110), []);
            engine.evaluate(sample(72), []);

            clock = first + COOLDOWN_MS;
            const decision = engine.evaluate(sample(110), []);

            expect(decision.notification?.title).toBe('High Resting Heart Rate');
            expect(engine.getState().lastNotifiedAt).toBe(first + COOLDOWN_MS);
        });

        it('bounds notifications under a rapidly oscillating input', () => {
            let notifications = 0;

            for (let i = 0; i < 600; i++) {
                const decision = engine.evaluate(sample(i % 2 === 0 ? 110 : 72), []);
                if (decision.notification) notifications++;
                clock += 1_000;
            }

            expect(notifications).toBe(2);
        });

        it('clears back to normal without a notification', () => {
            engine.evaluate(sample(110), []);
            const decision = engine.evaluate(sample(72), []);

            expect(decision.previous).toBe('critical');
            expect(decision.status).toBe('normal');
            expect(decision.notification).toBeUndefined();
            expect(decision.suppressed).toBe(false);
        });
    });

    describe('escalate', () => {
        it('forces critical with a high-urgency notification', () => {
            const decision = engine.escalate(0.85, 'resting');

            expect(decision).toEqual({
                previous: 'normal',
                status: 'critical',
                trigger: 'periodic_risk',
                mode: 'resting',
                suppressed: false,
                notification: {
                    title: 'Health Risk Detected',
                    body: 'Periodic analysis found a potential health risk (score 0.85). Please review your data.',
                    urgency: 'high',
                },
            });
        });

        it('respects the cooldown', () => {
            engine.escalate(0.85, 'resting');
            clock += 60_000;

            const decision = engine.escalate(0.9, 'resting');
            expect(decision.previous).toBe('critical');
            expect(decision.suppressed).toBe(true);
            expect(decision.notification).toBeUndefined();
        });
    });

    it('resets to normal with no cooldown history', () => {
        engine.evaluate(sample(110), []);
        engine.reset();

        expect(engine.getState()).toEqual({ status: 'normal', lastNotifiedAt: null });
    });
});
