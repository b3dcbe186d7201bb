/**
 * Stage 1 - Lightweight filter.
 * Bulk-fetches summary metrics in batches and keeps only tickers that clear every
 * price / size / liquidity / sector / valuation gate.
 */

import type { BulkCandidate, BulkQuoteProvider, QuoteSummaryBundle } from '../../types';
import type { BulkFilterConfig } from '../../config/screenerConfig';
import { round2 } from '../utils/financialUtils';
import { createLogger } from '../utils/logger';
import { err, ok, type Result } from '../utils/result';

const log = createLogger('Bulk');

export interface BulkMetrics {
    price: number;
    volume: number;
    marketCap: number;
    sector: string;
    currentRatio: number;
    operatingMargin: number;   // decimal
    trailingPE: number | null; // null = unknown; Infinity fails the P/E cap
}

const num = (value: number | null | undefined): number =>
    typeof value === 'number' && Number.isFinite(value) ? value : 0;

export const chunk = <T>(items: T[], size: number): T[][] => {
    const chunks: T[][] = [];
    for (let i = 0; i < items.length; i += size) {
        chunks.push(items.slice(i, i + size));
    }
    return chunks;
};

/**
 * Flatten a summary bundle; nothing null survives past this point.
 */
export const normalizeSummary = (data: QuoteSummaryBundle): BulkMetrics => {
    let volume = num(data.summaryDetail?.averageVolume);
    if (volume === 0) {
        // Thin listings often only carry the 10-day figure
        volume = num(data.price?.averageDailyVolume10Day);
    }

    const pe = data.summaryDetail?.trailingPE;

    return {
        price: num(data.price?.regularMarketPrice),
        volume,
        marketCap: num(data.price?.marketCap),
        sector: data.summaryProfile?.sector || 'Unknown',
        currentRatio: num(data.financialData?.currentRatio),
        operatingMargin: num(data.financialData?.operatingMargins),
        trailingPE: typeof pe === 'number' && !Number.isNaN(pe) ? pe : null,
    };
};

export const passesBulkFilters = (m: BulkMetrics, config: BulkFilterConfig): boolean => {
    if (m.trailingPE !== null && m.trailingPE > config.MAX_PE_RATIO) return false;
    if (m.price < config.MIN_PRICE) return false;
    if (m.marketCap < config.MIN_CAP) return false;
    if (m.volume < config.MIN_VOLUME) return false;
    if (config.EXCLUDED_SECTORS.some(excluded => m.sector.includes(excluded))) return false;
    if (m.currentRatio < config.MIN_CURRENT_RATIO) return false;
    if (m.operatingMargin <= 0) return false;
    return true;
};

export const toBulkCandidate = (ticker: string, m: BulkMetrics): BulkCandidate => ({
    ticker,
    sector: m.sector,
    price: m.price,
    opMarginPct: round2(m.operatingMargin * 100),
    peRatio: m.trailingPE && Number.isFinite(m.trailingPE) ? round2(m.trailingPE) : 0,
    currentRatio: m.currentRatio,
    marketCapB: round2(m.marketCap / 1_000_000_000),
});

/**
 * One provider round trip; a thrown batch becomes a PROVIDER error.
 */
export async function fetchBatch(
    provider: BulkQuoteProvider,
    batch: string[]
): Promise<Result<Map<string, QuoteSummaryBundle | string>>> {
    try {
        return ok(await provider.getSummaries(batch));
    } catch (error) {
        return err('PROVIDER', error instanceof Error ? error.message : String(error));
    }
}

export async function runBulkScreener(
    tickers: string[],
    provider: BulkQuoteProvider,
    config: BulkFilterConfig
): Promise<BulkCandidate[]> {
    log.info(`Running lightweight filter on ${tickers.length} stocks`);

    const batches = chunk(tickers, config.BATCH_SIZE);
    const survivors: BulkCandidate[] = [];

    for (let i = 0; i < batches.length; i++) {
        if (i % 5 === 0) {
            log.info(`Processing batch ${i + 1}/${batches.length}...`);
        }

        const summaries = await fetchBatch(provider, batches[i]);
        if (!summaries.ok) {
            log.warn(`Batch ${i + 1} failed, skipping ${batches[i].length} tickers (${summaries.message})`);
            continue;
        }

        for (const [symbol, data] of summaries.value) {
            // A string instead of a bundle is the provider's per-symbol error
            if (typeof data === 'string') {
                log.debug(`${symbol}: ${data}`);
                continue;
            }

            try {
                const metrics = normalizeSummary(data);
                if (passesBulkFilters(metrics, config)) {
                    survivors.push(toBulkCandidate(symbol, metrics));
                }
            } catch (error) {
                log.debug(`${symbol}: unreadable summary (${String(error)})`);
            }
        }
    }

    log.info(`${survivors.length}/${tickers.length} stocks passed the lightweight filter`);
    return survivors;
}
