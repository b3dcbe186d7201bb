/**
 * Screening pipeline - orchestrates all stages.
 * Universe -> Bulk Screener -> Deep Analyzer -> Trend Filter -> tier split.
 * Each stage completes before the next one starts.
 */

import type {
    AnalyzedCandidate,
    BulkCandidate,
    BulkQuoteProvider,
    FinancialStatementsProvider,
    HistoricalPriceProvider,
    Tier,
    TrendCandidate,
} from '../../types';
import type { ScreenerConfig } from '../../config/screenerConfig';
import { FinancialCache } from '../utils/cache';
import { createLogger } from '../utils/logger';
import type { Result } from '../utils/result';
import { runBulkScreener } from './bulkScreener';
import { runDeepAnalysis } from './deepAnalyzer';
import { applyTrendAlignment, type TrendFilterResult } from './trendFilter';

const log = createLogger('Pipeline');

export interface ScreenerProviders {
    quotes: BulkQuoteProvider;
    statements: FinancialStatementsProvider;
    history: HistoricalPriceProvider;
}

export interface PipelineDeps extends ScreenerProviders {
    cache?: FinancialCache;
    now?: () => number;
}

export type ScreenedRecord = AnalyzedCandidate | TrendCandidate;

export interface PipelineResult {
    survivors: BulkCandidate[];
    analyzed: AnalyzedCandidate[];
    trend: TrendFilterResult<AnalyzedCandidate> | null; // null when the filter is disabled
    tiers: Record<Tier, ScreenedRecord[]>;
    cacheSaved: Result<void>;
}

export const splitByTier = <T extends { tier: Tier }>(records: T[]): Record<Tier, T[]> => ({
    Fortress: records.filter(r => r.tier === 'Fortress'),
    Strong: records.filter(r => r.tier === 'Strong'),
    Risky: records.filter(r => r.tier === 'Risky'),
});

export async function runScreeningPipeline(
    tickers: string[],
    config: ScreenerConfig,
    deps: PipelineDeps
): Promise<PipelineResult> {
    const uniqueTickers = [...new Set(tickers)];
    const cache = deps.cache ?? new FinancialCache(config.CACHE_FILE);

    const survivors = await runBulkScreener(uniqueTickers, deps.quotes, config.BULK);
    const { records: analyzed, cacheSaved } = await runDeepAnalysis(survivors, config.DEEP, {
        statements: deps.statements,
        cache,
        now: deps.now,
    });

    let trend: TrendFilterResult<AnalyzedCandidate> | null = null;
    let finalRecords: ScreenedRecord[] = analyzed;
    if (config.TREND.ENABLED) {
        trend = await applyTrendAlignment(analyzed, deps.history);
        finalRecords = trend.records;
    }

    const tiers = splitByTier(finalRecords);
    log.info(
        `Fortress: ${tiers.Fortress.length} | Strong: ${tiers.Strong.length} | Risky: ${tiers.Risky.length}`
    );

    return { survivors, analyzed, trend, tiers, cacheSaved };
}
