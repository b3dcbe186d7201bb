/**
 * Yahoo Finance providers (via yahoo-finance2)
 * - quoteSummary           -> bulk summary bundles for the lightweight filter
 * - fundamentalsTimeSeries -> annual income statement / balance sheet
 * - chart                  -> daily adjusted closes for the trend filter
 *
 * Library schema validation is off; responses are narrowed from unknown here.
 */

import yahooFinance from 'yahoo-finance2';
import type {
    BulkQuoteProvider,
    FinancialStatements,
    FinancialStatementsProvider,
    HistoricalPriceProvider,
    HistoryRequest,
    QuoteSummaryBundle,
    StatementTable,
} from '../../types';
import { pLimit } from '../utils/concurrency';
import { MARGIN_LOOKBACK_PERIODS } from '../utils/financialUtils';
import { createLogger } from '../utils/logger';
import { ApiError } from '../utils/retry';

const log = createLogger('Yahoo');

const DEFAULT_CONCURRENCY = 8;
const STATEMENT_LOOKBACK_YEARS = 5;

// Keys on a fundamentals point that are not line items
const NON_ITEM_KEYS = new Set(['date', 'TYPE', 'periodType']);

// ============ JSON NARROWING ============

type JsonRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is JsonRecord =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

const field = (source: unknown, key: string): JsonRecord | null => {
    if (!isRecord(source)) return null;
    const value = source[key];
    return isRecord(value) ? value : null;
};

// Accepts plain numbers and Yahoo's { raw, fmt } wrappers
export const readNumber = (value: unknown): number | null => {
    if (typeof value === 'number') return Number.isFinite(value) ? value : null;
    if (isRecord(value)) return readNumber(value.raw);
    return null;
};

// Like readNumber, but keeps infinite values: Yahoo reports a trailing P/E over ~zero
// earnings as "Infinity"
export const readRatio = (value: unknown): number | null => {
    if (typeof value === 'number') return Number.isNaN(value) ? null : value;
    if (value === 'Infinity') return Infinity;
    if (value === '-Infinity') return -Infinity;
    if (isRecord(value)) return readRatio(value.raw);
    return null;
};

const readString = (value: unknown): string | null =>
    typeof value === 'string' && value.trim() !== '' ? value : null;

const toIsoDate = (value: unknown): string | null => {
    let date: Date | null = null;
    if (value instanceof Date) date = value;
    else if (typeof value === 'number') date = new Date(value > 1_000_000_000_000 ? value : value * 1000);
    else if (typeof value === 'string') date = new Date(value);
    if (!date || Number.isNaN(date.getTime())) return null;
    return date.toISOString().slice(0, 10);
};

const describe = (error: unknown): string => (error instanceof Error ? error.message : String(error));

// ============ MAPPERS ============

export function toQuoteSummaryBundle(raw: unknown): QuoteSummaryBundle {
    const price = field(raw, 'price');
    const summaryDetail = field(raw, 'summaryDetail');
    const summaryProfile = field(raw, 'summaryProfile');
    const financialData = field(raw, 'financialData');

    return {
        price: price && {
            regularMarketPrice: readNumber(price.regularMarketPrice),
            marketCap: readNumber(price.marketCap),
            averageDailyVolume10Day: readNumber(price.averageDailyVolume10Day),
        },
        summaryDetail: summaryDetail && {
            averageVolume: readNumber(summaryDetail.averageVolume),
            trailingPE: readRatio(summaryDetail.trailingPE),
        },
        summaryProfile: summaryProfile && {
            sector: readString(summaryProfile.sector),
        },
        financialData: financialData && {
            currentRatio: readNumber(financialData.currentRatio),
            operatingMargins: readNumber(financialData.operatingMargins),
        },
    };
}

/**
 * "totalRevenue" -> "Total Revenue"; all-caps keys ("EBIT") are kept as they are.
 */
export const lineItemName = (key: string): string => {
    const spaced = key.replace(/([a-z0-9])([A-Z])/g, '$1 $2');
    return spaced.charAt(0).toUpperCase() + spaced.slice(1);
};

/**
 * Fundamentals time-series points -> statement table, newest period first.
 * Points without any numeric line item are ignored.
 */
export function toStatementTable(points: unknown, maxPeriods: number = MARGIN_LOOKBACK_PERIODS): StatementTable {
    if (!Array.isArray(points)) return { periods: [], items: {} };

    const rows: { date: string; values: Map<string, number> }[] = [];
    for (const point of points) {
        if (!isRecord(point)) continue;
        const date = toIsoDate(point.date);
        if (!date) continue;

        const values = new Map<string, number>();
        for (const [key, value] of Object.entries(point)) {
            if (NON_ITEM_KEYS.has(key)) continue;
            const n = readNumber(value);
            if (n !== null) values.set(lineItemName(key), n);
        }
        if (values.size > 0) rows.push({ date, values });
    }

    rows.sort((a, b) => b.date.localeCompare(a.date));
    const kept = rows.slice(0, maxPeriods);

    const names = new Set<string>();
    for (const row of kept) {
        for (const name of row.values.keys()) names.add(name);
    }

    const items: StatementTable['items'] = {};
    for (const name of names) {
        items[name] = kept.map(row => row.values.get(name) ?? null);
    }

    return { periods: kept.map(row => row.date), items };
}

/**
 * Chart payload -> adjusted closes, oldest first. Falls back to the raw close when
 * no adjusted close is reported for a bar.
 */
export function toDailyCloses(raw: unknown): number[] {
    if (!isRecord(raw) || !Array.isArray(raw.quotes)) return [];

    const bars: { date: string; close: number }[] = [];
    for (const quote of raw.quotes) {
        if (!isRecord(quote)) continue;
        const date = toIsoDate(quote.date);
        const close = readNumber(quote.adjclose) ?? readNumber(quote.close);
        if (date && close !== null) bars.push({ date, close });
    }

    bars.sort((a, b) => a.date.localeCompare(b.date));
    return bars.map(bar => bar.close);
}

// ============ PROVIDERS ============

export class YahooQuoteProvider implements BulkQuoteProvider {
    constructor(private readonly concurrency: number = DEFAULT_CONCURRENCY) {}

    async getSummaries(tickers: string[]): Promise<Map<string, QuoteSummaryBundle | string>> {
        const limit = pLimit(this.concurrency);

        const entries = await Promise.all(
            tickers.map(ticker =>
                limit(async (): Promise<[string, QuoteSummaryBundle | string]> => {
                    try {
                        const raw: unknown = await yahooFinance.quoteSummary(
                            ticker,
                            { modules: ['summaryProfile', 'summaryDetail', 'financialData', 'price', 'defaultKeyStatistics'] },
                            { validateResult: false }
                        );
                        return [ticker, toQuoteSummaryBundle(raw)];
                    } catch (error) {
                        return [ticker, describe(error)];
                    }
                })
            )
        );

        return new Map(entries);
    }
}

export class YahooStatementsProvider implements FinancialStatementsProvider {
    async getStatements(ticker: string): Promise<FinancialStatements> {
        const period1 = new Date();
        period1.setFullYear(period1.getFullYear() - STATEMENT_LOOKBACK_YEARS);

        const [income, balance]: [unknown, unknown] = await Promise.all([
            yahooFinance.fundamentalsTimeSeries(
                ticker,
                { period1, type: 'annual', module: 'financials' },
                { validateResult: false }
            ),
            yahooFinance.fundamentalsTimeSeries(
                ticker,
                { period1, type: 'annual', module: 'balance-sheet' },
                { validateResult: false }
            ),
        ]);

        return { income: toStatementTable(income), balance: toStatementTable(balance) };
    }
}

const lookbackStart = (request: HistoryRequest): Date => {
    const start = new Date();
    // '1y' is the only lookback the trend filter asks for
    if (request.period === '1y') start.setFullYear(start.getFullYear() - 1);
    return start;
};

export class YahooHistoryProvider implements HistoricalPriceProvider {
    constructor(private readonly concurrency: number = DEFAULT_CONCURRENCY) {}

    async getDailyCloses(tickers: string[], request: HistoryRequest): Promise<Map<string, number[]>> {
        const limit = pLimit(this.concurrency);
        const period1 = lookbackStart(request);

        const settled = await Promise.allSettled(
            tickers.map(ticker =>
                limit(async () => {
                    const raw: unknown = await yahooFinance.chart(
                        ticker,
                        { period1, interval: request.interval },
                        { validateResult: false }
                    );
                    return { ticker, closes: toDailyCloses(raw) };
                })
            )
        );

        const closes = new Map<string, number[]>();
        let failures = 0;
        let lastError: unknown;
        for (const outcome of settled) {
            if (outcome.status === 'fulfilled') {
                if (outcome.value.closes.length > 0) closes.set(outcome.value.ticker, outcome.value.closes);
            } else {
                failures++;
                lastError = outcome.reason;
            }
        }

        if (tickers.length > 0 && failures === tickers.length) {
            throw new ApiError('NETWORK', `History download failed for every ticker: ${describe(lastError)}`);
        }
        if (failures > 0) log.warn(`History unavailable for ${failures}/${tickers.length} tickers`);

        return closes;
    }
}
