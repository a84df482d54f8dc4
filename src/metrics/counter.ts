export interface MetricCounters {
    received: number;
    validated: number;
    dropped_invalid: number;
    dropped_overflow: number;
    evaluations: number;
    assessments: number;
    critical_signals: number;
    notifications_dispatched: number;
    notifications_suppressed: number;
    notifications_failed: number;
    persist_failed: number;
    persist_replayed: number;
}

function emptyCounters(): MetricCounters {
    return {
        received: 0,
        validated: 0,
        dropped_invalid: 0,
        dropped_overflow: 0,
        evaluations: 0,
        assessments: 0,
        critical_signals: 0,
        notifications_dispatched: 0,
        notifications_suppressed: 0,
        notifications_failed: 0,
        persist_failed: 0,
        persist_replayed: 0,
    };
}

export class Metrics {
    private counters = emptyCounters();

    increment(name: keyof MetricCounters, by = 1): void {
        this.counters[name] += by;
    }

    getCounters(): MetricCounters {
        return { ...this.counters };
    }

    reset(): void {
        this.counters = emptyCounters();
    }
}
