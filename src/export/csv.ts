import { formatInTimeZone } from 'date-fns-tz';
import type { AssessmentRecord } from '../scoring/types.js';

export const CSV_HEADER = [
    'Date',
    'Time',
    'HeartRate',
    'HRV',
    'RespiratoryRate',
    'Activity',
    'SleepQuality',
    'RiskLevel',
    'RhythmStatus',
    'PatternStatus',
] as const;

function whole(value: number): string {
    return String(Math.trunc(value));
}

export function toCsvRow(record: AssessmentRecord, timeZone = 'UTC'): string {
    const { assessment, snapshot } = record;
    const at = new Date(assessment.timestamp);

    const fields = [
        formatInTimeZone(at, timeZone, 'yyyy-MM-dd'),
        formatInTimeZone(at, timeZone, 'HH:mm:ss'),
        whole(snapshot.meanHeartRate),
        whole(snapshot.hrvMean),
        whole(snapshot.respiratoryRate),
        whole(snapshot.activityLevel),
        `${whole(snapshot.sleepQuality * 100)}%`,
        assessment.risk.label,
        assessment.rhythm.label,
        assessment.pattern.label,
    ];

    return fields.join(',');
}

/**
 * One line per record, in the order given, after the header. Lines end with
 * `\n`, including the last.
 */
export function exportCsv(records: readonly AssessmentRecord[], timeZone = 'UTC'): string {
    const lines = [CSV_HEADER.join(','), ...records.map((record) => toCsvRow(record, timeZone))];
    return `${lines.join('\n')}\n`;
}
