/**
 * Tier report rows and CSV output.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { Tier, TrendCandidate } from '../../types';
import { TIERS } from '../../types';
import type { ScreenedRecord } from '../screener/pipeline';
import { createLogger } from '../utils/logger';

const log = createLogger('Report');

export const REPORT_COLUMNS = [
    'Ticker',
    'Tier',
    'Price',
    'P/E',
    'Sector',
    'Z-Score',
    'ROIC %',
    'Op Margin %',
    'Avg Margin (4Y)',
    'Curr Ratio',
    'Int Cov',
    'Mkt Cap (B)',
] as const;

export const TREND_COLUMNS = ['SMA_200', 'Trend_Dist_%'] as const;

export type ReportColumn = (typeof REPORT_COLUMNS)[number] | (typeof TREND_COLUMNS)[number];

export type ReportRow = Partial<Record<ReportColumn, string | number>>;

export const TIER_FILES: Record<Tier, string> = {
    Fortress: 'fortress_stocks.csv',
    Strong: 'strong_stocks.csv',
    Risky: 'risky_stocks.csv',
};

const hasTrend = (record: ScreenedRecord): record is TrendCandidate =>
    'sma200' in record;

export const toReportRow = (record: ScreenedRecord): ReportRow => {
    const row: ReportRow = {
        'Ticker': record.ticker,
        'Tier': record.tier,
        'Price': record.price,
        'P/E': record.peRatio,
        'Sector': record.sector,
        'Z-Score': record.zScore,
        'ROIC %': record.roicPct,
        'Op Margin %': record.opMarginPct,
        'Avg Margin (4Y)': record.avgMargin4yPct,
        'Curr Ratio': record.currentRatio,
        'Int Cov': record.interestCoverage,
        'Mkt Cap (B)': record.marketCapB,
    };
    if (hasTrend(record)) {
        row['SMA_200'] = record.sma200;
        row['Trend_Dist_%'] = record.trendDistPct;
    }
    return row;
};

export const columnsFor = (records: ScreenedRecord[]): ReportColumn[] =>
    records.some(hasTrend) ? [...REPORT_COLUMNS, ...TREND_COLUMNS] : [...REPORT_COLUMNS];

const escapeCsv = (value: string | number | undefined): string => {
    if (value === undefined) return '';
    const text = String(value);
    return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
};

export const toCsv = (records: ScreenedRecord[]): string => {
    const columns = columnsFor(records);
    const lines = [columns.map(escapeCsv).join(',')];
    for (const record of records) {
        const row = toReportRow(record);
        lines.push(columns.map(col => escapeCsv(row[col])).join(','));
    }
    return lines.join('\n') + '\n';
};

/**
 * Write one CSV per tier into `dir` (created when missing). Returns the written paths.
 */
export async function writeTierReports(
    dir: string,
    tiers: Record<Tier, ScreenedRecord[]>
): Promise<string[]> {
    await mkdir(dir, { recursive: true });

    const written: string[] = [];
    for (const tier of TIERS) {
        const file = path.join(dir, TIER_FILES[tier]);
        await writeFile(file, toCsv(tiers[tier]), 'utf8');
        written.push(file);
    }

    log.info(`Saved ${written.length} tier reports to ${dir}`);
    return written;
}
