import { describe, it, expect, vi, beforeEach } from 'vitest';

const mocks = vi.hoisted(() => ({ get: vi.fn() }));

vi.mock('axios', () => ({
    default: { get: mocks.get, isAxiosError: () => false },
}));

import { NASDAQ_TRADED_URL, fetchNasdaqUniverse, parseNasdaqDirectory } from '../../services/api/nasdaq';
import { ApiError } from '../../services/utils/retry';

const DIRECTORY = [
    'Nasdaq Traded|Symbol|Security Name|Listing Exchange|Market Category|ETF|Round Lot Size|Test Issue|Financial Status|CQS Symbol|NASDAQ Symbol|NextShares',
    'Y|AAPL|Apple Inc. - Common Stock|Q|Q|N|100|N|N||AAPL|N',
    'Y|SPY|SPDR S&P 500 ETF Trust|P| |Y|100|N||SPY|SPY|N',
    'Y|ZXZZT|NASDAQ TEST STOCK|Q|G|N|100|Y|N||ZXZZT|N',
    'Y|BF$B|Brown-Forman Corporation Class B|N| |N|100|N||BF.B|BF$B|N',
    'Y|GOOGL|Alphabet Inc. - Class A|Q|Q|N|100|N|N||GOOGL|N',
    'Y|KO|Coca-Cola Company (The) Common Stock|N| |N|100|N||KO|KO|N',
    'File Creation Time: 1018202609:00|||||||||||',
    '',
].join('\r\n');

describe('NASDAQ Universe', () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    describe('parseNasdaqDirectory', () => {
        it('should keep short common-stock symbols and rewrite class separators', () => {
            expect(parseNasdaqDirectory(DIRECTORY)).toEqual(['AAPL', 'BF-B', 'KO']);
        });

        it('should return nothing for an empty document', () => {
            expect(parseNasdaqDirectory('')).toEqual([]);
        });

        it('should reject an unexpected header', () => {
            expect(() => parseNasdaqDirectory('Ticker|Name\nAAPL|Apple')).toThrow(/Unexpected directory header/);
        });
    });

    describe('fetchNasdaqUniverse', () => {
        it('should download and parse the directory', async () => {
            mocks.get.mockResolvedValue({ data: DIRECTORY });

            expect(await fetchNasdaqUniverse()).toEqual(['AAPL', 'BF-B', 'KO']);
            expect(mocks.get).toHaveBeenCalledWith(NASDAQ_TRADED_URL, expect.objectContaining({ responseType: 'text' }));
        });

        it('should return an empty list when the download fails', async () => {
            mocks.get.mockRejectedValue(new ApiError('NOT_FOUND', 'directory moved'));

            expect(await fetchNasdaqUniverse()).toEqual([]);
            expect(mocks.get).toHaveBeenCalledTimes(1);
        });

        it('should return an empty list when the document cannot be parsed', async () => {
            mocks.get.mockResolvedValue({ data: '<html>maintenance</html>' });

            expect(await fetchNasdaqUniverse()).toEqual([]);
        });
    });
});
