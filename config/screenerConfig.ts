/**
 * Centralized Screener Configuration
 *
 * Defines every threshold used by the Bulk Screener, Deep Analyzer and Trend Filter.
 * Built once (defaults + environment overrides) and passed into each stage.
 */

import path from 'node:path';
import { createLogger } from '../services/utils/logger';

const log = createLogger('Config');

export interface BulkFilterConfig {
    MIN_PRICE: number;           // $
    MIN_VOLUME: number;          // shares / day
    MIN_CAP: number;             // $
    MIN_CURRENT_RATIO: number;
    MAX_PE_RATIO: number;
    EXCLUDED_SECTORS: string[];  // substring match against the sector name
    BATCH_SIZE: number;          // provider bulk-query limit
}

export interface DeepAnalysisConfig {
    CACHE_EXPIRY_DAYS: number;
    FORTRESS_MARGIN_THRESHOLD: number; // decimal, 0.05 = 5%
    MIN_INTEREST_COVERAGE: number;
    MIN_ROIC: number;                  // decimal
    REQUEST_DELAY_MS: number;          // pause between per-ticker fetches
}

export interface TrendConfig {
    ENABLED: boolean;
}

export interface ScreenerConfig {
    BULK: BulkFilterConfig;
    DEEP: DeepAnalysisConfig;
    TREND: TrendConfig;
    DATA_DIR: string;
    CACHE_FILE: string;
}

// Altman zones used by the tier rule
export const TIER_RULES = {
    ALTMAN_Z_SAFE: 2.99,
    ALTMAN_Z_DISTRESS: 1.81,
} as const;

const DEFAULT_DATA_DIR = 'ScreenerData';

export const DEFAULT_SCREENER_CONFIG: ScreenerConfig = {
    BULK: {
        MIN_PRICE: 5,
        MIN_VOLUME: 200_000,
        MIN_CAP: 300_000_000,
        MIN_CURRENT_RATIO: 1.2,
        MAX_PE_RATIO: 35,
        EXCLUDED_SECTORS: ['Financial Services', 'Real Estate', 'Utilities'],
        BATCH_SIZE: 500,
    },
    DEEP: {
        CACHE_EXPIRY_DAYS: 7,
        FORTRESS_MARGIN_THRESHOLD: 0.05,
        MIN_INTEREST_COVERAGE: 3,
        MIN_ROIC: 0.08,
        REQUEST_DELAY_MS: 0,
    },
    TREND: {
        ENABLED: true,
    },
    DATA_DIR: DEFAULT_DATA_DIR,
    CACHE_FILE: path.join(DEFAULT_DATA_DIR, 'financial_cache.json'),
};

type Env = Record<string, string | undefined>;

const readNumber = (env: Env, key: string, fallback: number): number => {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') return fallback;
    const value = Number(raw);
    if (!Number.isFinite(value)) {
        log.warn(`${key}="${raw}" is not a number, using ${fallback}`);
        return fallback;
    }
    return value;
};

const readBoolean = (env: Env, key: string, fallback: boolean): boolean => {
    const raw = env[key]?.trim().toLowerCase();
    if (!raw) return fallback;
    if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
    if (['0', 'false', 'no', 'off'].includes(raw)) return false;
    log.warn(`${key}="${raw}" is not a boolean, using ${fallback}`);
    return fallback;
};

const readList = (env: Env, key: string, fallback: string[]): string[] => {
    const raw = env[key];
    if (raw === undefined) return fallback;
    return raw.split(',').map(s => s.trim()).filter(s => s.length > 0);
};

/**
 * Build the run configuration from `SCREENER_*` environment variables.
 * Anything missing or malformed keeps its default.
 */
export function loadScreenerConfig(env: Env = process.env): ScreenerConfig {
    const defaults = DEFAULT_SCREENER_CONFIG;
    const dataDir = env.SCREENER_DATA_DIR?.trim() || defaults.DATA_DIR;

    return {
        BULK: {
            MIN_PRICE: readNumber(env, 'SCREENER_MIN_PRICE', defaults.BULK.MIN_PRICE),
            MIN_VOLUME: readNumber(env, 'SCREENER_MIN_VOLUME', defaults.BULK.MIN_VOLUME),
            MIN_CAP: readNumber(env, 'SCREENER_MIN_CAP', defaults.BULK.MIN_CAP),
            MIN_CURRENT_RATIO: readNumber(env, 'SCREENER_MIN_CURRENT_RATIO', defaults.BULK.MIN_CURRENT_RATIO),
            MAX_PE_RATIO: readNumber(env, 'SCREENER_MAX_PE_RATIO', defaults.BULK.MAX_PE_RATIO),
            EXCLUDED_SECTORS: readList(env, 'SCREENER_EXCLUDED_SECTORS', defaults.BULK.EXCLUDED_SECTORS),
            BATCH_SIZE: defaults.BULK.BATCH_SIZE,
        },
        DEEP: {
            CACHE_EXPIRY_DAYS: readNumber(env, 'SCREENER_CACHE_EXPIRY_DAYS', defaults.DEEP.CACHE_EXPIRY_DAYS),
            FORTRESS_MARGIN_THRESHOLD: readNumber(env, 'SCREENER_FORTRESS_MARGIN', defaults.DEEP.FORTRESS_MARGIN_THRESHOLD),
            MIN_INTEREST_COVERAGE: readNumber(env, 'SCREENER_MIN_INTEREST_COVERAGE', defaults.DEEP.MIN_INTEREST_COVERAGE),
            MIN_ROIC: readNumber(env, 'SCREENER_MIN_ROIC', defaults.DEEP.MIN_ROIC),
            REQUEST_DELAY_MS: readNumber(env, 'SCREENER_REQUEST_DELAY_MS', defaults.DEEP.REQUEST_DELAY_MS),
        },
        TREND: {
            ENABLED: readBoolean(env, 'SCREENER_TREND_FILTER', defaults.TREND.ENABLED),
        },
        DATA_DIR: dataDir,
        CACHE_FILE: path.join(dataDir, 'financial_cache.json'),
    };
}
