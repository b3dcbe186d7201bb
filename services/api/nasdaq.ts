/**
 * NASDAQ Trader symbol directory
 * Pipe-separated list of every US-listed security, with ETF and test-issue flags.
 */

import axios from 'axios';
import { createLogger } from '../utils/logger';
import { fetchWithRetry } from '../utils/retry';

const log = createLogger('Universe');

export const NASDAQ_TRADED_URL = 'https://www.nasdaqtrader.com/dynamic/symdir/nasdaqtraded.txt';

// Longer symbols are warrants, units or rights
const MAX_SYMBOL_LENGTH = 4;

/**
 * Parse the directory: drop test issues and ETFs, keep symbols of at most 4 characters
 * and rewrite class separators (BF$B -> BF-B).
 */
export function parseNasdaqDirectory(text: string): string[] {
    const lines = text.split(/\r?\n/).filter(line => line.trim() !== '');
    if (lines.length === 0) return [];

    const header = lines[0].split('|').map(h => h.trim());
    const symbolCol = header.indexOf('Symbol');
    const etfCol = header.indexOf('ETF');
    const testCol = header.indexOf('Test Issue');
    if (symbolCol < 0 || etfCol < 0 || testCol < 0) {
        throw new Error(`Unexpected directory header: ${lines[0]}`);
    }

    const symbols: string[] = [];
    for (const line of lines.slice(1)) {
        // Footer row: "File Creation Time: ..."
        if (line.startsWith('File Creation Time')) continue;

        const cols = line.split('|');
        const symbol = cols[symbolCol]?.trim();
        if (!symbol) continue;
        if (cols[testCol]?.trim() !== 'N' || cols[etfCol]?.trim() !== 'N') continue;
        if (symbol.length > MAX_SYMBOL_LENGTH) continue;

        symbols.push(symbol.replace(/\$/g, '-'));
    }
    return symbols;
}

/**
 * Download the US universe. Any failure yields an empty list.
 */
export async function fetchNasdaqUniverse(url: string = NASDAQ_TRADED_URL): Promise<string[]> {
    log.info('Fetching North American universe...');
    try {
        const response = await fetchWithRetry(
            () => axios.get<string>(url, { responseType: 'text', timeout: 30_000 }),
            { maxRetries: 2 }
        );
        const symbols = parseNasdaqDirectory(response.data);
        log.info(`Found ${symbols.length} US stocks`);
        return symbols;
    } catch (error) {
        log.error('Error fetching US symbol list', error);
        return [];
    }
}
