/**
 * File-backed financial metrics cache.
 *
 * Loaded once when the Deep Analyzer starts and written back once when it ends.
 * A missing or corrupt file is an empty cache; a failed write is logged and reported,
 * never thrown.
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { CacheEntry, CacheMap } from '../../types';
import { createLogger } from './logger';
import { err, ok, type Result } from './result';

const log = createLogger('Cache');

// roic value recorded for a ticker whose statements could not be fetched
export const FAILED_FETCH_ROIC = -999;

export const SECONDS_PER_DAY = 86_400;

export const nowSeconds = (): number => Date.now() / 1000;

export const isFresh = (entry: CacheEntry, now: number, expirySeconds: number): boolean =>
    now - entry.timestamp < expirySeconds;

export const isFailedFetch = (entry: CacheEntry): boolean => entry.roic === FAILED_FETCH_ROIC;

export const failedFetchEntry = (now: number): CacheEntry => ({
    timestamp: now,
    z_score: 0,
    roic: FAILED_FETCH_ROIC,
    int_cov: 0,
});

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

const isFiniteNumber = (value: unknown): value is number =>
    typeof value === 'number' && Number.isFinite(value);

export function parseCacheEntry(value: unknown): CacheEntry | null {
    if (!isRecord(value)) return null;
    const { timestamp, z_score, roic, int_cov } = value;
    if (!isFiniteNumber(timestamp) || !isFiniteNumber(z_score) || !isFiniteNumber(roic) || !isFiniteNumber(int_cov)) {
        return null;
    }
    return { timestamp, z_score, roic, int_cov };
}

/**
 * Parse a serialized cache document. Corrupt documents yield an empty map;
 * malformed entries are dropped individually.
 */
export function parseCacheDocument(text: string): CacheMap {
    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch (error) {
        log.warn('Cache file is not valid JSON, starting empty', error);
        return {};
    }
    if (!isRecord(parsed)) {
        log.warn('Cache file is not a ticker mapping, starting empty');
        return {};
    }

    const entries: CacheMap = {};
    let dropped = 0;
    for (const [ticker, raw] of Object.entries(parsed)) {
        const entry = parseCacheEntry(raw);
        if (entry) entries[ticker] = entry;
        else dropped++;
    }
    if (dropped > 0) log.warn(`Dropped ${dropped} malformed cache entries`);
    return entries;
}

export class FinancialCache {
    private entries: CacheMap = {};

    constructor(private readonly filePath: string) {}

    async load(): Promise<CacheMap> {
        let text: string;
        try {
            text = await readFile(this.filePath, 'utf8');
        } catch (error) {
            if (!(isRecord(error) && error.code === 'ENOENT')) {
                log.warn(`Could not read ${this.filePath}, starting empty`, error);
            }
            this.entries = {};
            return {};
        }

        this.entries = parseCacheDocument(text);
        log.info(`Loaded ${Object.keys(this.entries).length} entries from ${this.filePath}`);
        return { ...this.entries };
    }

    get(ticker: string): CacheEntry | undefined {
        return this.entries[ticker];
    }

    put(ticker: string, entry: CacheEntry): void {
        this.entries[ticker] = entry;
    }

    snapshot(): CacheMap {
        return { ...this.entries };
    }

    /**
     * Persist the whole mapping (temp file + rename so readers never see a partial file).
     */
    async save(): Promise<Result<void>> {
        const tmpPath = `${this.filePath}.tmp`;
        try {
            await mkdir(path.dirname(this.filePath), { recursive: true });
            await writeFile(tmpPath, JSON.stringify(this.entries), 'utf8');
            await rename(tmpPath, this.filePath);
            log.info(`Saved ${Object.keys(this.entries).length} entries to ${this.filePath}`);
            return ok(undefined);
        } catch (error) {
            log.warn(`Could not save cache to ${this.filePath}`, error);
            return err('PERSISTENCE', error instanceof Error ? error.message : String(error));
        }
    }
}
