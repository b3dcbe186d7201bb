import { mkdtemp } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type {
    BulkCandidate,
    BulkQuoteProvider,
    FinancialStatements,
    FinancialStatementsProvider,
    HistoricalPriceProvider,
    HistoryRequest,
    QuoteSummaryBundle,
    StatementTable,
} from '../../types';

export const tempDir = (): Promise<string> => mkdtemp(path.join(os.tmpdir(), 'screener-test-'));

export const table = (periods: string[], items: StatementTable['items']): StatementTable => ({ periods, items });

export const EMPTY_TABLE: StatementTable = { periods: [], items: {} };

export const PERIODS = ['2024-12-31', '2023-12-31', '2022-12-31', '2021-12-31'];

/**
 * Healthy company: avg margin 13.19%, coverage 8, ROIC 20%, Z 3.81 at a $2B cap.
 */
export const healthyStatements = (): FinancialStatements => ({
    income: table(PERIODS, {
        'Total Revenue': [900e6, 800e6, 700e6, 600e6],
        'Operating Income': [160e6, 120e6, 70e6, 60e6],
        'Interest Expense': [-20e6, -20e6, -18e6, -15e6],
    }),
    balance: table(PERIODS, {
        'Total Assets': [1000e6, 950e6, 900e6, 850e6],
        'Total Liabilities Net Minority Interest': [600e6, 580e6, 560e6, 540e6],
        'Current Assets': [400e6, 380e6, 360e6, 340e6],
        'Current Liabilities': [200e6, 190e6, 180e6, 170e6],
        'Retained Earnings': [100e6, 90e6, 80e6, 70e6],
    }),
});

export const candidate = (ticker: string, overrides: Partial<BulkCandidate> = {}): BulkCandidate => ({
    ticker,
    sector: 'Technology',
    price: 50,
    opMarginPct: 17.5,
    peRatio: 20,
    currentRatio: 2,
    marketCapB: 2,
    ...overrides,
});

export const bundle = (overrides: {
    price?: number | null;
    marketCap?: number | null;
    averageVolume?: number | null;
    averageDailyVolume10Day?: number | null;
    trailingPE?: number | null;
    sector?: string | null;
    currentRatio?: number | null;
    operatingMargins?: number | null;
} = {}): QuoteSummaryBundle => {
    const v = {
        price: 50,
        marketCap: 5e9,
        averageVolume: 1_000_000,
        averageDailyVolume10Day: 900_000,
        trailingPE: 20,
        sector: 'Technology',
        currentRatio: 2,
        operatingMargins: 0.25,
        ...overrides,
    };
    return {
        price: { regularMarketPrice: v.price, marketCap: v.marketCap, averageDailyVolume10Day: v.averageDailyVolume10Day },
        summaryDetail: { averageVolume: v.averageVolume, trailingPE: v.trailingPE },
        summaryProfile: { sector: v.sector },
        financialData: { currentRatio: v.currentRatio, operatingMargins: v.operatingMargins },
    };
};

export class FakeQuoteProvider implements BulkQuoteProvider {
    calls: string[][] = [];
    failingBatches = new Set<number>();

    constructor(private readonly data: Record<string, QuoteSummaryBundle | string>) {}

    async getSummaries(tickers: string[]): Promise<Map<string, QuoteSummaryBundle | string>> {
        this.calls.push(tickers);
        if (this.failingBatches.has(this.calls.length)) {
            throw new Error('batch unavailable');
        }
        const result = new Map<string, QuoteSummaryBundle | string>();
        for (const ticker of tickers) {
            const entry = this.data[ticker];
            if (entry !== undefined) result.set(ticker, entry);
        }
        return result;
    }
}

export class FakeStatementsProvider implements FinancialStatementsProvider {
    calls: string[] = [];

    constructor(private readonly data: Record<string, FinancialStatements | Error>) {}

    async getStatements(ticker: string): Promise<FinancialStatements> {
        this.calls.push(ticker);
        const entry = this.data[ticker];
        if (entry instanceof Error) throw entry;
        return entry ?? { income: EMPTY_TABLE, balance: EMPTY_TABLE };
    }
}

export class FakeHistoryProvider implements HistoricalPriceProvider {
    calls: { tickers: string[]; request: HistoryRequest }[] = [];
    failure: Error | null = null;

    constructor(private readonly data: Record<string, number[]>) {}

    async getDailyCloses(tickers: string[], request: HistoryRequest): Promise<Map<string, number[]>> {
        this.calls.push({ tickers, request });
        if (this.failure) throw this.failure;
        const result = new Map<string, number[]>();
        for (const ticker of tickers) {
            const closes = this.data[ticker];
            if (closes) result.set(ticker, closes);
        }
        return result;
    }
}

// `flat` repeated `count - 1` times, then `last`
export const closes = (count: number, flat: number, last: number = flat): number[] =>
    [...Array.from({ length: count - 1 }, () => flat), last];
