import 'dotenv/config';
import Table from 'cli-table3';
import { loadScreenerConfig } from '../config/screenerConfig';
import { fetchNasdaqUniverse } from '../services/api/nasdaq';
import { YahooHistoryProvider, YahooQuoteProvider, YahooStatementsProvider } from '../services/api/yahoo';
import { columnsFor, toReportRow, writeTierReports } from '../services/report/tierReport';
import { runScreeningPipeline, type ScreenedRecord } from '../services/screener/pipeline';
import { configureLogger, isLogLevel } from '../services/utils/logger';
import { TIERS } from '../types';

const TIER_BADGES = { Fortress: '🏰', Strong: '💪', Risky: '⚠️' } as const;

const renderTable = (records: ScreenedRecord[]): string => {
    const columns = columnsFor(records);
    const table = new Table({ head: columns });
    for (const record of records) {
        const row = toReportRow(record);
        table.push(columns.map(col => String(row[col] ?? '')));
    }
    return table.toString();
};

const run = async () => {
    const level = process.env.SCREENER_LOG_LEVEL?.trim().toLowerCase();
    if (level && isLogLevel(level)) configureLogger({ minLevel: level });

    const config = loadScreenerConfig();
    const args = process.argv.slice(2).map(t => t.trim().toUpperCase()).filter(Boolean);
    const tickers = args.length > 0 ? args : await fetchNasdaqUniverse();

    if (tickers.length === 0) {
        console.log('No tickers to screen.');
        return;
    }

    console.log(`\n🚀 Screening ${tickers.length} stocks...\n`);

    const result = await runScreeningPipeline(tickers, config, {
        quotes: new YahooQuoteProvider(),
        statements: new YahooStatementsProvider(),
        history: new YahooHistoryProvider(),
    });

    if (!result.cacheSaved.ok) {
        console.log(`⚠️  Financial cache not saved (${result.cacheSaved.message}); failed fetches will be retried next run.`);
    }

    if (result.trend && !result.trend.applied) {
        console.log('⚠️  Price history unavailable: tiers below are NOT trend-filtered.');
    }

    for (const tier of TIERS) {
        const records = result.tiers[tier];
        console.log(`\n${TIER_BADGES[tier]} ${tier.toUpperCase()} (${records.length})`);
        if (records.length > 0) console.log(renderTable(records));
    }

    const files = await writeTierReports(config.DATA_DIR, result.tiers);
    console.log(`\n📊 SCREEN COMPLETE: ${result.survivors.length} passed the bulk filter, ${result.analyzed.length} analyzed.`);
    files.forEach(file => console.log(`   -> ${file}`));
};

run().catch(console.error);
