/**
 * Stage 3 - Trend alignment.
 * Keeps names trading above their 200-day simple moving average.
 */

import type { HistoricalPriceProvider, TrendMetrics } from '../../types';
import { round2, simpleMovingAverage } from '../utils/financialUtils';
import { createLogger } from '../utils/logger';

const log = createLogger('Trend');

export const SMA_WINDOW = 200;

/**
 * `applied: false` means the price history could not be fetched at all and the input
 * came back unfiltered. Every other stage drops on failure; this one passes through.
 */
export type TrendFilterResult<T> =
    | { applied: true; records: (T & TrendMetrics)[] }
    | { applied: false; records: T[] };

export interface TrendReading {
    sma: number;
    latestClose: number;
    distancePct: number;
    uptrend: boolean; // strictly above the average
}

/**
 * 200-day reading from closes ordered oldest first; null with fewer than 200 closes.
 */
export function readTrend(closes: number[]): TrendReading | null {
    const sma = simpleMovingAverage(closes, SMA_WINDOW);
    if (sma === null) return null;

    const latestClose = closes[closes.length - 1];
    const distancePct = ((latestClose - sma) / sma) * 100;
    if (!Number.isFinite(distancePct)) {
        throw new Error(`Invalid trend distance (close=${latestClose}, sma=${sma})`);
    }

    return { sma, latestClose, distancePct, uptrend: latestClose > sma };
}

export async function applyTrendAlignment<T extends { ticker: string }>(
    input: T[],
    provider: HistoricalPriceProvider
): Promise<TrendFilterResult<T>> {
    if (input.length === 0) {
        log.info('Input is empty, nothing to check');
        return { applied: true, records: [] };
    }

    const tickers = input.map(r => r.ticker);
    log.info(`Checking 200-day SMA for ${tickers.length} stocks`);

    let history: Map<string, number[]>;
    try {
        history = await provider.getDailyCloses(tickers, { period: '1y', interval: '1d' });
    } catch (error) {
        log.error('Failed to fetch price history, returning input unfiltered', error);
        return { applied: false, records: input };
    }

    const uptrend: (T & TrendMetrics)[] = [];

    for (const record of input) {
        const closes = history.get(record.ticker);
        if (!closes) continue;

        try {
            const reading = readTrend(closes);
            if (!reading) {
                log.info(`${record.ticker}: insufficient history (<${SMA_WINDOW} days), skipping`);
                continue;
            }

            if (reading.uptrend) {
                uptrend.push({
                    ...record,
                    sma200: round2(reading.sma),
                    trendDistPct: round2(reading.distancePct),
                });
            }
        } catch (error) {
            log.warn(`${record.ticker}: trend check failed`, error);
        }
    }

    if (uptrend.length > 0) {
        log.info(`${uptrend.length}/${tickers.length} stocks are in a long-term uptrend`);
    } else {
        log.info('No stocks passed the trend alignment filter');
    }

    // Smallest distance first: the most recently reclaimed trends
    uptrend.sort((a, b) => a.trendDistPct - b.trendDistPct);
    return { applied: true, records: uptrend };
}
