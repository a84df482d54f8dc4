import { config as loadDotenv } from 'dotenv';

loadDotenv();

export interface MonitorConfig {
    ringCapacity: number;
    windowCapacity: number;
    channelCapacity: number;
    analysisIntervalMs: number;
    cooldownMs: number;
    estimatedMaxHr: number;
    age: number;
}

export interface AppConfig {
    nats: { url: string; stream: string };
    contracts: { path: string };
    rules: { path: string };
    monitor: MonitorConfig;
    cache: { path: string; ttlMs: number };
    http: { port: number };
    log: { level: string };
}

function readString(key: string, fallback: string): string {
    const raw = process.env[key];
    return raw === undefined || raw === '' ? fallback : raw;
}

/** Positive integers only. Unset or empty variables take the fallback. */
function readPositiveInt(key: string, fallback: number): number {
    const raw = process.env[key];
    if (raw === undefined || raw === '') return fallback;

    const value = Number.parseInt(raw, 10);
    if (Number.isNaN(value) || value <= 0) {
        throw new Error(`Invalid number for environment variable ${key}: ${raw}`);
    }
    return value;
}

function loadMonitorConfig(): MonitorConfig {
    return {
        ringCapacity: readPositiveInt('RING_CAPACITY', 200),
        // 5 minutes at 1 Hz
        windowCapacity: readPositiveInt('WINDOW_CAPACITY', 300),
        channelCapacity: readPositiveInt('CHANNEL_CAPACITY', 1000),
        analysisIntervalMs: readPositiveInt('ANALYSIS_INTERVAL_MS', 60_000),
        cooldownMs: readPositiveInt('ALERT_COOLDOWN_MS', 300_000),
        estimatedMaxHr: readPositiveInt('ESTIMATED_MAX_HR', 190),
        age: readPositiveInt('USER_AGE', 40),
    };
}

export function loadConfig(): AppConfig {
    return {
        nats: {
            url: readString('NATS_URL', 'nats://localhost:4222'),
            stream: readString('NATS_STREAM', 'CARDIO'),
        },
        contracts: { path: readString('CONTRACTS_PATH', './contracts') },
        rules: { path: readString('RULES_PATH', './rules/default.json') },
        monitor: loadMonitorConfig(),
        cache: {
            path: readString('CACHE_PATH', './data/assessment-cache.json'),
            ttlMs: readPositiveInt('CACHE_TTL_MS', 3_600_000),
        },
        http: { port: readPositiveInt('HTTP_PORT', 8093) },
        log: { level: readString('LOG_LEVEL', 'info') },
    };
}
