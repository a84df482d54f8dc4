import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import { logger } from '../config/logger.js';
import { SchemaIds, SchemaValidator } from '../contracts/schema-validator.js';
import type { AssessmentRecord } from '../scoring/types.js';

export const DEFAULT_CACHE_TTL_MS = 3_600_000;
export const DEFAULT_REPLAYED_ID_LIMIT = 1000;

export interface CachedAssessment {
    record: AssessmentRecord;
    /** Epoch milliseconds */
    cachedAt: number;
}

/**
 * Last good assessment, kept on disk for when the persistence collaborator is
 * unreachable, plus a replay queue of records whose write failed.
 *
 * The queue is keyed by assessment id: a record is queued at most once and,
 * once replayed, is not accepted again. Only the most recent replayed ids are
 * remembered. One replay runs at a time.
 */
export class OfflineCache {
    private cached: CachedAssessment | null = null;
    private cacheLoaded = false;
    private queue: AssessmentRecord[] = [];
    private queueLoaded = false;
    private replayed = new Set<string>();
    private replaying: Promise<number> | null = null;
    private readonly queuePath: string;

    constructor(
        private filePath: string,
        private validator: SchemaValidator,
        private ttlMs: number = DEFAULT_CACHE_TTL_MS,
        private now: () => number = Date.now,
        private replayedLimit: number = DEFAULT_REPLAYED_ID_LIMIT,
    ) {
        this.queuePath = join(dirname(filePath), 'replay-queue.json');
    }

    store(record: AssessmentRecord): void {
        this.cached = { record: structuredClone(record), cachedAt: this.now() };
        this.cacheLoaded = true;
        this.writeJson(this.filePath, this.cached);
    }

    /**
     * The cached record, or null when absent or older than the TTL.
     */
    load(): AssessmentRecord | null {
        if (!this.cacheLoaded) {
            this.cached = this.readCache();
            this.cacheLoaded = true;
        }

        if (!this.cached || this.isExpired(this.cached)) {
            return null;
        }

        return structuredClone(this.cached.record);
    }

    clear(): void {
        this.cached = null;
        this.cacheLoaded = true;
        this.writeJson(this.filePath, null);
    }

    /**
     * Queue a record whose write failed. Returns false when its id is already
     * queued or was replayed before.
     */
    enqueue(record: AssessmentRecord): boolean {
        this.ensureQueueLoaded();
        const id = record.assessment.id;

        if (this.replayed.has(id) || this.queue.some((queued) => queued.assessment.id === id)) {
            logger.debug({ assessmentId: id }, 'Record already queued for replay');
            return false;
        }

        this.queue.push(structuredClone(record));
        this.writeJson(this.queuePath, this.queue);
        return true;
    }

    pending(): number {
        this.ensureQueueLoaded();
        return this.queue.length;
    }

    /**
     * Replay queued records oldest first. Stops at the first failure and keeps
     * the rest queued. Returns how many this call replayed; a call made while
     * a replay is in flight waits for it and returns 0.
     */
    async replay(handler: (record: AssessmentRecord) => Promise<void>): Promise<number> {
        if (this.replaying) {
            await this.replaying;
            return 0;
        }

        this.replaying = this.drain(handler).finally(() => {
            this.replaying = null;
        });
        return this.replaying;
    }

    private async drain(handler: (record: AssessmentRecord) => Promise<void>): Promise<number> {
        this.ensureQueueLoaded();
        let count = 0;

        for (let record = this.queue[0]; record !== undefined; record = this.queue[0]) {
            const id = record.assessment.id;

            try {
                await handler(record);
            } catch (err) {
                logger.warn({ assessmentId: id, remaining: this.queue.length, error: err }, 'Replay interrupted');
                break;
            }

            this.queue = this.queue.filter((queued) => queued.assessment.id !== id);
            this.rememberReplayed(id);
            count++;
        }

        if (count > 0) {
            this.writeJson(this.queuePath, this.queue);
            logger.info({ count, remaining: this.queue.length }, 'Replayed queued assessments');
        }

        return count;
    }

    private rememberReplayed(id: string): void {
        this.replayed.add(id);
        for (const oldest of this.replayed) {
            if (this.replayed.size <= this.replayedLimit) break;
            this.replayed.delete(oldest);
        }
    }

    private isExpired(entry: CachedAssessment): boolean {
        return this.now() - entry.cachedAt > this.ttlMs;
    }

    private readCache(): CachedAssessment | null {
        const data = this.readJson(this.filePath);
        if (data === null) return null;

        if (!this.validator.is<CachedAssessment>(SchemaIds.cachedAssessment, data)) {
            logger.warn({ path: this.filePath }, 'Ignoring cache file that does not match its schema');
            return null;
        }
        return data;
    }

    private ensureQueueLoaded(): void {
        if (this.queueLoaded) return;
        this.queueLoaded = true;

        const data = this.readJson(this.queuePath);
        if (data === null) return;

        if (this.validator.is<AssessmentRecord[]>(SchemaIds.replayQueue, data)) {
            this.queue = data;
        } else {
            logger.warn({ path: this.queuePath }, 'Ignoring replay queue that does not match its schema');
        }
    }

    private readJson(path: string): unknown {
        if (!existsSync(path)) return null;

        try {
            const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
            return parsed;
        } catch (err) {
            logger.warn({ path, error: err }, 'Failed to read offline cache file');
            return null;
        }
    }

    private writeJson(path: string, data: unknown): void {
        try {
            mkdirSync(dirname(path), { recursive: true });
            writeFileSync(path, JSON.stringify(data, null, 2));
        } catch (err) {
            logger.warn({ path, error: err }, 'Failed to write offline cache file');
        }
    }
}
