import type { SampleMode } from '../monitor/types.js';

export type AlertStatus = 'normal' | 'monitoring' | 'warning' | 'critical';

export type NotificationUrgency = 'low' | 'medium' | 'high';

export interface Notification {
    title: string;
    body: string;
    urgency: NotificationUrgency;
}

export interface AlertRules {
    resting: {
        high_threshold: number;
        low_threshold: number;
    };
    exercise: {
        high_threshold: number;
    };
    irregularity: {
        window: number;
        stdev_threshold: number;
    };
    periodic_risk: {
        min_samples: number;
        score_threshold: number;
    };
}

export interface AlertState {
    status: AlertStatus;
    lastNotifiedAt: number | null;
}

export type AlertTrigger = 'sample' | 'irregularity' | 'periodic_risk';

export interface AlertDecision {
    previous: AlertStatus;
    status: AlertStatus;
    trigger: AlertTrigger;
    mode: SampleMode;
    /** Set when the decision should be dispatched; absent when nothing changed or the cooldown held it back. */
    notification?: Notification;
    suppressed: boolean;
}

export const DEFAULT_ALERT_RULES: AlertRules = {
    resting: {
        high_threshold: 100,
        low_threshold: 50,
    },
    exercise: {
        high_threshold: 180,
    },
    irregularity: {
        window: 10,
        stdev_threshold: 15,
    },
    periodic_risk: {
        min_samples: 60,
        score_threshold: 0.7,
    },
};
