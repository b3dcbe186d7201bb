import { describe, it, expect } from 'vitest';
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { columnsFor, toCsv, toReportRow, writeTierReports } from '../../services/report/tierReport';
import type { AnalyzedCandidate, TrendCandidate } from '../../types';
import { candidate, tempDir } from './fixtures';

const HEADER = 'Ticker,Tier,Price,P/E,Sector,Z-Score,ROIC %,Op Margin %,Avg Margin (4Y),Curr Ratio,Int Cov,Mkt Cap (B)';

const analyzed = (ticker: string, sector = 'Technology'): AnalyzedCandidate => ({
    ...candidate(ticker, { sector }),
    tier: 'Fortress',
    zScore: 3.81,
    roicPct: 20,
    avgMargin4yPct: 13.19,
    interestCoverage: 8,
});

const trending = (ticker: string): TrendCandidate => ({
    ...analyzed(ticker),
    sma200: 100.1,
    trendDistPct: 19.88,
});

describe('Tier Report', () => {
    it('should map a record to report columns', () => {
        expect(toReportRow(analyzed('ACME'))).toEqual({
            'Ticker': 'ACME',
            'Tier': 'Fortress',
            'Price': 50,
            'P/E': 20,
            'Sector': 'Technology',
            'Z-Score': 3.81,
            'ROIC %': 20,
            'Op Margin %': 17.5,
            'Avg Margin (4Y)': 13.19,
            'Curr Ratio': 2,
            'Int Cov': 8,
            'Mkt Cap (B)': 2,
        });
    });

    it('should add trend columns only when a record carries them', () => {
        expect(columnsFor([analyzed('A')])).toHaveLength(12);
        expect(columnsFor([analyzed('A'), trending('B')]).slice(-2)).toEqual(['SMA_200', 'Trend_Dist_%']);
    });

    it('should quote values containing separators or quotes', () => {
        expect(toCsv([analyzed('ACME', 'Consumer, Cyclical'), analyzed('SAY', 'Say "Hi"')])).toBe(
            `${HEADER}\n` +
            'ACME,Fortress,50,20,"Consumer, Cyclical",3.81,20,17.5,13.19,2,8,2\n' +
            'SAY,Fortress,50,20,"Say ""Hi""",3.81,20,17.5,13.19,2,8,2\n'
        );
    });

    it('should write trend values after the base columns', () => {
        expect(toCsv([trending('UP')])).toBe(
            `${HEADER},SMA_200,Trend_Dist_%\n` +
            'UP,Fortress,50,20,Technology,3.81,20,17.5,13.19,2,8,2,100.1,19.88\n'
        );
    });

    it('should write one file per tier, header only when empty', async () => {
        const dir = path.join(await tempDir(), 'reports');

        const files = await writeTierReports(dir, { Fortress: [analyzed('ACME')], Strong: [], Risky: [] });

        expect(files).toEqual([
            path.join(dir, 'fortress_stocks.csv'),
            path.join(dir, 'strong_stocks.csv'),
            path.join(dir, 'risky_stocks.csv'),
        ]);
        expect(await readFile(files[0], 'utf8')).toBe(
            `${HEADER}\nACME,Fortress,50,20,Technology,3.81,20,17.5,13.19,2,8,2\n`
        );
        expect(await readFile(files[1], 'utf8')).toBe(`${HEADER}\n`);
    });
});
