import { logger } from '../config/logger.js';
import { mean } from '../monitor/statistics.js';
import type { AssessmentRepository } from '../monitor/collaborators.js';
import type { AssessmentRecord } from '../scoring/types.js';

const DAY_MS = 86_400_000;

export type RiskTrend = 'improving' | 'stable' | 'worsening';

export interface HealthTrends {
    averageHeartRate: number;
    averageHrv: number;
    averageRespiratoryRate: number;
    totalActivity: number;
    averageSleepQuality: number;
    riskTrend: RiskTrend;
    recordCount: number;
}

/**
 * Share of high-risk records among the three newest, compared with the rest.
 * `records` is ordered oldest first.
 */
export function riskTrend(records: readonly AssessmentRecord[]): RiskTrend {
    if (records.length <= 1) return 'stable';

    const highRisk = (r: AssessmentRecord): number => (r.assessment.risk.label === 'High' ? 1 : 0);
    const recent = records.slice(-3).map(highRisk);
    const older = records.slice(0, Math.max(0, records.length - 3)).map(highRisk);

    const recentAvg = mean(recent);
    const olderAvg = mean(older);

    if (recentAvg > olderAvg + 0.2) return 'worsening';
    if (recentAvg < olderAvg - 0.2) return 'improving';
    return 'stable';
}

/**
 * Bounded in-process store. Keeps at most `maxRecords`, dropping the oldest.
 */
export class InMemoryAssessmentRepository implements AssessmentRepository {
    private records: AssessmentRecord[] = [];

    constructor(
        private maxRecords = 10_000,
        private now: () => number = Date.now,
    ) { }

    async save(record: AssessmentRecord): Promise<void> {
        if (this.records.some((r) => r.assessment.id === record.assessment.id)) {
            logger.debug({ assessmentId: record.assessment.id }, 'Assessment already stored');
            return;
        }

        this.records.push(structuredClone(record));
        this.records.sort((a, b) => Date.parse(a.assessment.timestamp) - Date.parse(b.assessment.timestamp));

        if (this.records.length > this.maxRecords) {
            this.records.splice(0, this.records.length - this.maxRecords);
        }
    }

    async query(daysBack: number): Promise<AssessmentRecord[]> {
        return this.within(daysBack).reverse().map((r) => structuredClone(r));
    }

    async trends(days = 7): Promise<HealthTrends> {
        const records = this.within(days);

        if (records.length === 0) {
            return {
                averageHeartRate: 0,
                averageHrv: 0,
                averageRespiratoryRate: 0,
                totalActivity: 0,
                averageSleepQuality: 0,
                riskTrend: 'stable',
                recordCount: 0,
            };
        }

        const snapshots = records.map((r) => r.snapshot);

        return {
            averageHeartRate: mean(snapshots.map((s) => s.meanHeartRate)),
            averageHrv: mean(snapshots.map((s) => s.hrvMean)),
            averageRespiratoryRate: mean(snapshots.map((s) => s.respiratoryRate)),
            totalActivity: snapshots.reduce((sum, s) => sum + s.activityLevel, 0),
            averageSleepQuality: mean(snapshots.map((s) => s.sleepQuality)),
            riskTrend: riskTrend(records),
            recordCount: records.length,
        };
    }

    count(): number {
        return this.records.length;
    }

    /** Oldest first. */
    private within(days: number): AssessmentRecord[] {
        const since = this.now() - days * DAY_MS;
        return this.records.filter((r) => Date.parse(r.assessment.timestamp) >= since);
    }
}
