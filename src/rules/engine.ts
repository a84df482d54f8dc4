import { logger } from '../config/logger.js';
import { stdev } from '../monitor/statistics.js';
import type { Sample, SampleMode } from '../monitor/types.js';
import type {
    AlertDecision,
    AlertRules,
    AlertState,
    AlertStatus,
    AlertTrigger,
    Notification,
} from './types.js';

export const DEFAULT_COOLDOWN_MS = 300_000;

/**
 * Edge-triggered alert state machine with a global notification cooldown.
 *
 * State follows the latest sample (plus the irregularity overlay) and may move
 * between any two statuses. A notification is produced only on a transition,
 * and only when the cooldown since the previous dispatched notification has
 * elapsed; otherwise the state still changes but nothing is dispatched.
 */
export class AlertEngine {
    private state: AlertState = { status: 'normal', lastNotifiedAt: null };

    constructor(
        private rules: AlertRules,
        private cooldownMs: number = DEFAULT_COOLDOWN_MS,
        private now: () => number = Date.now,
    ) { }

    /**
     * Evaluate a validated sample against the thresholds of its mode.
     *
     * @param window - raw values of the feature window, newest last, used by the irregularity overlay
     */
    evaluate(sample: Sample, window: readonly number[]): AlertDecision {
        const previous = this.state.status;
        let status = this.classify(sample);
        let trigger: AlertTrigger = 'sample';

        const { window: size, stdev_threshold } = this.rules.irregularity;
        if (sample.mode === 'resting' && status === 'normal' && window.length >= size) {
            const spread = stdev(window.slice(window.length - size));
            if (spread > stdev_threshold) {
                status = 'monitoring';
                trigger = 'irregularity';
            }
        }

        if (status === previous) {
            return { previous, status, trigger, mode: sample.mode, suppressed: false };
        }

        if (status === 'normal') {
            this.state.status = status;
            logger.debug({ previous, status }, 'Alert state cleared');
            return { previous, status, trigger, mode: sample.mode, suppressed: false };
        }

        return this.gate(previous, status, trigger, sample.mode, this.buildNotification(status, trigger, sample));
    }

    /**
     * Force the engine into critical after a high periodic risk score.
     * Dispatch is attempted even without a transition but still respects the cooldown.
     */
    escalate(score: number, mode: SampleMode): AlertDecision {
        const previous = this.state.status;
        const notification: Notification = {
            title: 'Health Risk Detected',
            body: `Periodic analysis found a potential health risk (score ${score.toFixed(2)}). Please review your data.`,
            urgency: 'high',
        };

        return this.gate(previous, 'critical', 'periodic_risk', mode, notification);
    }

    getState(): AlertState {
        return { ...this.state };
    }

    reset(): void {
        this.state = { status: 'normal', lastNotifiedAt: null };
    }

    private classify(sample: Sample): AlertStatus {
        if (sample.mode === 'exercise') {
            return sample.value > this.rules.exercise.high_threshold ? 'warning' : 'normal';
        }

        if (sample.value > this.rules.resting.high_threshold) {
            return 'critical';
        }
        if (sample.value > 0 && sample.value < this.rules.resting.low_threshold) {
            return 'warning';
        }
        return 'normal';
    }

    private gate(
        previous: AlertStatus,
        status: AlertStatus,
        trigger: AlertTrigger,
        mode: SampleMode,
        notification: Notification,
    ): AlertDecision {
        const now = this.now();
        const last = this.state.lastNotifiedAt;
        this.state.status = status;

        if (last !== null && now - last < this.cooldownMs) {
            logger.debug(
                { previous, status, trigger, remainingMs: this.cooldownMs - (now - last) },
                'Alert notification suppressed by cooldown',
            );
            return { previous, status, trigger, mode, suppressed: true };
        }

        this.state.lastNotifiedAt = now;
        logger.info({ previous, status, trigger }, 'Alert state changed');

        return { previous, status, trigger, mode, notification, suppressed: false };
    }

    private buildNotification(status: AlertStatus, trigger: AlertTrigger, sample: Sample): Notification {
        const bpm = Math.trunc(sample.value);

        if (trigger === 'irregularity') {
            return {
                title: 'Irregular Heart Rhythm Detected',
                body: 'Your heart rhythm appears irregular. Open the live monitor to review it.',
                urgency: 'medium',
            };
        }

        if (sample.mode === 'exercise') {
            return {
                title: 'High Heart Rate During Exercise',
                body: `Your heart rate is ${bpm} bpm. Consider reducing intensity.`,
                urgency: 'medium',
            };
        }

        if (status === 'critical') {
            return {
                title: 'High Resting Heart Rate',
                body: `Your resting heart rate is ${bpm} bpm. This may require attention.`,
                urgency: 'high',
            };
        }

        return {
            title: 'Low Heart Rate Detected',
            body: `Your heart rate is ${bpm} bpm. Monitor for symptoms.`,
            urgency: 'medium',
        };
    }
}
