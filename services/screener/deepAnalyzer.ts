/**
 * Stage 2 - Deep financial analysis.
 * Pulls statements for each bulk survivor, derives margin / coverage / ROIC / Altman Z,
 * assigns a tier and records the metrics in the financial cache.
 */

import type {
    AnalyzedCandidate,
    BulkCandidate,
    FinancialStatements,
    FinancialStatementsProvider,
} from '../../types';
import type { DeepAnalysisConfig } from '../../config/screenerConfig';
import { classifyTier } from '../scoring/tierClassifier';
import {
    FinancialCache,
    SECONDS_PER_DAY,
    failedFetchEntry,
    isFailedFetch,
    isFresh,
    nowSeconds,
} from '../utils/cache';
import {
    LINE_ITEMS,
    altmanZFromStatements,
    averageOperatingMargin,
    interestCoverage,
    lookupFirst,
    returnOnInvestedCapital,
    round2,
} from '../utils/financialUtils';
import { createLogger } from '../utils/logger';
import { err, ok, unwrapOr, type Result } from '../utils/result';
import { delay } from '../utils/retry';

const log = createLogger('Deep');

export interface DeepAnalyzerDeps {
    statements: FinancialStatementsProvider;
    cache: FinancialCache;
    now?: () => number; // unix seconds
}

export interface DeepAnalysisResult {
    records: AnalyzedCandidate[];
    cacheSaved: Result<void>; // PERSISTENCE error when the cache file could not be written
}

export interface StatementMetrics {
    avgMargin: number; // decimal, 0 when it cannot be computed
    fortressMargin: boolean;
    positiveMargin: boolean;
    interestCoverage: number;
    roic: number;
    zScore: number;
}

const isEmpty = (statements: FinancialStatements): boolean =>
    statements.income.periods.length === 0 || statements.balance.periods.length === 0;

/**
 * PROVIDER when the fetch throws, DATA_UNAVAILABLE when either statement is empty.
 */
export async function fetchStatements(
    provider: FinancialStatementsProvider,
    ticker: string
): Promise<Result<FinancialStatements>> {
    let data: FinancialStatements;
    try {
        data = await provider.getStatements(ticker);
    } catch (error) {
        return err('PROVIDER', error instanceof Error ? error.message : String(error));
    }
    if (isEmpty(data)) return err('DATA_UNAVAILABLE', 'No statement data');
    return ok(data);
}

/**
 * Every ratio the tier rule needs, with the documented default for each failed step.
 */
export function computeStatementMetrics(
    { income, balance }: FinancialStatements,
    marketCap: number,
    fortressMarginThreshold: number
): StatementMetrics {
    const margin = averageOperatingMargin(income);
    const avgMargin = unwrapOr(margin, 0);

    const ebit = lookupFirst(income, LINE_ITEMS.EBIT);
    const interest = lookupFirst(income, LINE_ITEMS.INTEREST_EXPENSE);
    const totalAssets = lookupFirst(balance, LINE_ITEMS.TOTAL_ASSETS);
    const currentLiabilities = lookupFirst(balance, LINE_ITEMS.CURRENT_LIABILITIES);

    return {
        avgMargin,
        fortressMargin: margin.ok && avgMargin > fortressMarginThreshold,
        positiveMargin: margin.ok && avgMargin > 0,
        interestCoverage: unwrapOr(interestCoverage(ebit, interest), 0),
        roic: unwrapOr(returnOnInvestedCapital(ebit, totalAssets, currentLiabilities), 0),
        zScore: unwrapOr(altmanZFromStatements(balance, income, marketCap), 0),
    };
}

export async function runDeepAnalysis(
    candidates: BulkCandidate[],
    config: DeepAnalysisConfig,
    deps: DeepAnalyzerDeps
): Promise<DeepAnalysisResult> {
    const { statements, cache } = deps;
    const clock = deps.now ?? nowSeconds;

    log.info(`Fetching deep financials for ${candidates.length} survivors`);

    await cache.load();
    const currentTime = clock();
    const expirySeconds = config.CACHE_EXPIRY_DAYS * SECONDS_PER_DAY;

    const results: AnalyzedCandidate[] = [];

    for (let i = 0; i < candidates.length; i++) {
        const base = candidates[i];
        const { ticker } = base;

        if (i % 20 === 0) {
            log.info(`Analyzing ${i + 1}/${candidates.length}: ${ticker}...`);
        }

        const cached = cache.get(ticker);
        if (cached && isFresh(cached, currentTime, expirySeconds) && isFailedFetch(cached)) {
            log.debug(`${ticker}: previous fetch failed, skipping until cache expiry`);
            continue;
        }

        if (config.REQUEST_DELAY_MS > 0 && i > 0) {
            await delay(config.REQUEST_DELAY_MS);
        }

        const fetched = await fetchStatements(statements, ticker);
        if (!fetched.ok) {
            if (fetched.kind === 'DATA_UNAVAILABLE') log.info(`No data for ${ticker} (skipping)`);
            else log.warn(`${ticker}: statement fetch failed, skipping (${fetched.message})`);
            cache.put(ticker, failedFetchEntry(currentTime));
            continue;
        }

        const metrics = computeStatementMetrics(
            fetched.value,
            base.marketCapB * 1_000_000_000,
            config.FORTRESS_MARGIN_THRESHOLD
        );

        const zScore = round2(metrics.zScore);
        const coverage = round2(metrics.interestCoverage);

        cache.put(ticker, {
            timestamp: currentTime,
            z_score: zScore,
            roic: metrics.roic,
            int_cov: coverage,
        });

        const tier = classifyTier(
            {
                interestCoverage: coverage,
                roic: metrics.roic,
                fortressMargin: metrics.fortressMargin,
                positiveMargin: metrics.positiveMargin,
                zScore,
            },
            config
        );

        results.push({
            ...base,
            tier,
            zScore,
            roicPct: round2(metrics.roic * 100),
            avgMargin4yPct: round2(metrics.avgMargin * 100),
            interestCoverage: coverage,
        });
    }

    const cacheSaved = await cache.save();

    log.info(`Analyzed ${results.length}/${candidates.length} survivors`);
    return { records: results, cacheSaved };
}
