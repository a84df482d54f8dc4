import { describe, it, expect, beforeAll, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync, existsSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { OfflineCache } from '../../../src/cache/offline-cache.js';
import type { SchemaValidator } from '../../../src/contracts/schema-validator.js';
import type { AssessmentRecord } from '../../../src/scoring/types.js';
import { loadedValidator, makeRecord, testId } from '../../fixtures/records.js';

const TTL_MS = 3_600_000;

describe('OfflineCache', () => {
    let validator: SchemaValidator;
    let dir: string;
    let cachePath: string;
    let clock: number;

    const newCache = () => new OfflineCache(cachePath, validator, TTL_MS, () => clock);

    beforeAll(() => {
        validator = loadedValidator();
    });

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'cardio-cache-'));
        cachePath = join(dir, 'nested', 'assessment-cache.json');
        clock = 1_700_000_000_000;
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    describe('last assessment', () => {
        it('is null before anything is stored', () => {
            expect(newCache().load()).toBeNull();
        });

        it('returns a copy of the stored record', () => {
            const cache = newCache();
            const record = makeRecord();
            cache.store(record);

            const loaded = cache.load();
            expect(loaded).toEqual(record);
            expect(loaded).not.toBe(record);
        });

        it('survives a restart', () => {
            newCache().store(makeRecord({ id: testId(3) }));

            expect(existsSync(cachePath)).toBe(true);
            expect(newCache().load()?.assessment.id).toBe(testId(3));
        });

        it('expires after the TTL', () => {
            const cache = newCache();
            cache.store(makeRecord());

            clock += TTL_MS;
            expect(cache.load()).not.toBeNull();

            clock += 1;
            expect(cache.load()).toBeNull();
        });

        it('ignores a file that does not match the schema', () => {
            const cache = newCache();
            cache.store(makeRecord());
            writeFileSync(cachePath, JSON.stringify({ record: { assessment: 'broken' }, cachedAt: clock }));

            expect(newCache().load()).toBeNull();
        });

        it('ignores a file that is not JSON', () => {
            newCache().store(makeRecord());
            writeFileSync(cachePath, '{not json');

            expect(newCache().load()).toBeNull();
        });

        it('forgets the record on clear', () => {
            const cache = newCache();
            cache.store(makeRecord());
            cache.clear();

            expect(cache.load()).toBeNull();
            expect(newCache().load()).toBeNull();
        });
    });

    describe('replay queue', () => {
        it('queues each assessment id once', () => {
            const cache = newCache();

            expect(cache.enqueue(makeRecord({ id: testId(1) }))).toBe(true);
            expect(cache.enqueue(makeRecord({ id: testId(1) }))).toBe(false);
            expect(cache.enqueue(makeRecord({ id: testId(2) }))).toBe(true);
            expect(cache.pending()).toBe(2);
        });

        it('replays oldest first and empties the queue', async () => {
            const cache = newCache();
            cache.enqueue(makeRecord({ id: testId(1) }));
            cache.enqueue(makeRecord({ id: testId(2) }));

            const seen: string[] = [];
            const replayed = await cache.replay(async (record) => {
                seen.push(record.assessment.id);
            });

            expect(replayed).toBe(2);
            expect(seen).toEqual([testId(1), testId(2)]);
            expect(cache.pending()).toBe(0);
        });

        it('stops at the first failure and keeps the rest', async () => {
            const cache = newCache();
            cache.enqueue(makeRecord({ id: testId(1) }));
            cache.enqueue(makeRecord({ id: testId(2) }));
            cache.enqueue(makeRecord({ id: testId(3) }));

            const handler = vi.fn(async (record: AssessmentRecord) => {
                if (record.assessment.id === testId(2)) throw new Error('store offline');
            });

            expect(await cache.replay(handler)).toBe(1);
            expect(handler).toHaveBeenCalledTimes(2);
            expect(cache.pending()).toBe(2);
        });

        it('never accepts a replayed id again', async () => {
            const cache = newCache();
            cache.enqueue(makeRecord({ id: testId(1) }));
            await cache.replay(async () => undefined);

            expect(cache.enqueue(makeRecord({ id: testId(1) }))).toBe(false);
            expect(cache.pending()).toBe(0);
        });

        it('runs one replay at a time and keeps a record whose save failed', async () => {
            const cache = newCache();
            cache.enqueue(makeRecord({ id: testId(1) }));
            cache.enqueue(makeRecord({ id: testId(2) }));

            const saved: string[] = [];
            let refused = false;
            const handler = async (record: AssessmentRecord) => {
                await Promise.resolve();
                if (record.assessment.id === testId(2) && !refused) {
                    refused = true;
                    throw new Error('store offline');
                }
                saved.push(record.assessment.id);
            };

            const counts = await Promise.all([cache.replay(handler), cache.replay(handler)]);

            expect(counts).toEqual([1, 0]);
            expect(saved).toEqual([testId(1)]);
            expect(cache.pending()).toBe(1);

            expect(await cache.replay(handler)).toBe(1);
            expect(saved).toEqual([testId(1), testId(2)]);
            expect(cache.pending()).toBe(0);
        });

        it('remembers only the most recent replayed ids', async () => {
            const cache = new OfflineCache(cachePath, validator, TTL_MS, () => clock, 2);
            for (const n of [1, 2, 3]) {
                cache.enqueue(makeRecord({ id: testId(n) }));
                await cache.replay(async () => undefined);
            }

            expect(cache.enqueue(makeRecord({ id: testId(3) }))).toBe(false);
            expect(cache.enqueue(makeRecord({ id: testId(2) }))).toBe(false);
            expect(cache.enqueue(makeRecord({ id: testId(1) }))).toBe(true);
        });

        it('persists pending records across restarts', async () => {
            newCache().enqueue(makeRecord({ id: testId(5) }));

            const restarted = newCache();
            expect(restarted.pending()).toBe(1);

            const seen: string[] = [];
            await restarted.replay(async (record) => {
                seen.push(record.assessment.id);
            });
            expect(seen).toEqual([testId(5)]);
        });
    });
});
