// ============ TIERS ============

export type Tier = 'Fortress' | 'Strong' | 'Risky';

export const TIERS: readonly Tier[] = ['Fortress', 'Strong', 'Risky'];

// ============ SECURITY RECORDS ============

// Stage 1 output. Margin is a percentage, market cap is in billions.
export interface BulkCandidate {
  ticker: string;
  sector: string;
  price: number;
  opMarginPct: number;
  peRatio: number; // 0 when trailing P/E is unknown
  currentRatio: number;
  marketCapB: number;
}

export interface DeepMetrics {
  tier: Tier;
  zScore: number;
  roicPct: number;
  avgMargin4yPct: number;
  interestCoverage: number;
}

export type AnalyzedCandidate = BulkCandidate & DeepMetrics;

export interface TrendMetrics {
  sma200: number;
  trendDistPct: number;
}

export type TrendCandidate = AnalyzedCandidate & TrendMetrics;

// ============ PROVIDER PAYLOADS ============

/**
 * Subset of the Yahoo quoteSummary modules the bulk screener reads.
 * Every field may be missing or null depending on the listing.
 */
export interface QuoteSummaryBundle {
  price?: {
    regularMarketPrice?: number | null;
    marketCap?: number | null;
    averageDailyVolume10Day?: number | null;
  } | null;
  summaryDetail?: {
    averageVolume?: number | null;
    trailingPE?: number | null;
  } | null;
  summaryProfile?: {
    sector?: string | null;
  } | null;
  financialData?: {
    currentRatio?: number | null;
    operatingMargins?: number | null;
  } | null;
}

/**
 * Multi-period statement keyed by line-item name ("Total Revenue", "EBIT", ...).
 * Periods are ordered newest first; every item row is aligned with `periods`.
 */
export interface StatementTable {
  periods: string[];
  items: Record<string, (number | null)[]>;
}

export interface FinancialStatements {
  income: StatementTable;
  balance: StatementTable;
}

export interface HistoryRequest {
  period: '1y';
  interval: '1d';
}

// ============ PROVIDERS ============

export interface BulkQuoteProvider {
  /** A string value in place of a bundle signals a fetch error for that symbol. */
  getSummaries(tickers: string[]): Promise<Map<string, QuoteSummaryBundle | string>>;
}

export interface FinancialStatementsProvider {
  getStatements(ticker: string): Promise<FinancialStatements>;
}

export interface HistoricalPriceProvider {
  /** Adjusted daily closes, oldest first. Tickers without data are absent. */
  getDailyCloses(tickers: string[], request: HistoryRequest): Promise<Map<string, number[]>>;
}

// ============ CACHE ============

// Persisted as-is, hence the snake_case keys.
export interface CacheEntry {
  timestamp: number; // unix seconds
  z_score: number;
  roic: number;
  int_cov: number;
}

export type CacheMap = Record<string, CacheEntry>;
