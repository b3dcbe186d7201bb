import type { StatementTable } from '../../types';
import { err, finite, ok, type Result } from './result';

/**
 * Line-item synonyms, in lookup order. Providers disagree on naming
 * ("EBIT" vs "Operating Income"), so every logical quantity is an ordered list.
 */
export const LINE_ITEMS = {
    EBIT: ['EBIT', 'Operating Income', 'Pretax Income'],
    EBIT_STRICT: ['EBIT', 'Operating Income'],
    OPERATING_INCOME: ['Operating Income', 'EBIT'],
    INTEREST_EXPENSE: ['Interest Expense', 'Interest Expense Non Operating'],
    TOTAL_REVENUE: ['Total Revenue'],
    TOTAL_ASSETS: ['Total Assets'],
    TOTAL_LIABILITIES: ['Total Liabilities Net Minority Interest', 'Total Liabilities'],
    CURRENT_ASSETS: ['Current Assets', 'Total Current Assets'],
    CURRENT_LIABILITIES: ['Current Liabilities', 'Total Current Liabilities'],
    RETAINED_EARNINGS: ['Retained Earnings'],
} as const;

// Interest coverage reported when a company has no interest expense
export const NO_DEBT_COVERAGE = 100;

export const MARGIN_LOOKBACK_PERIODS = 4;

export const round2 = (value: number): number => Math.round(value * 100) / 100;

const isNumber = (value: number | null | undefined): value is number =>
    typeof value === 'number' && Number.isFinite(value);

/**
 * First row present in the table among `names`, or undefined.
 */
export function findRow(
    table: StatementTable,
    names: readonly string[]
): (number | null)[] | undefined {
    for (const name of names) {
        const row = table.items[name];
        if (row) return row;
    }
    return undefined;
}

/**
 * Most-recent-period value of the first synonym that has one; `fallback` otherwise.
 */
export function lookupFirst(
    table: StatementTable,
    names: readonly string[],
    fallback: number = 0
): number {
    for (const name of names) {
        const latest = table.items[name]?.[0];
        if (isNumber(latest)) return latest;
    }
    return fallback;
}

/**
 * Average operating margin (decimal) across the newest `maxPeriods` periods.
 * Operating income falls back to EBIT, then to a zero series. Only periods with a
 * finite income/revenue ratio count toward the average.
 */
export function averageOperatingMargin(
    income: StatementTable,
    maxPeriods: number = MARGIN_LOOKBACK_PERIODS
): Result<number> {
    const revenue = findRow(income, LINE_ITEMS.TOTAL_REVENUE);
    if (!revenue) return err('COMPUTATION', 'Total Revenue not reported');

    const operating = findRow(income, LINE_ITEMS.OPERATING_INCOME) ?? revenue.map(() => 0);

    const margins: number[] = [];
    const periods = Math.min(maxPeriods, revenue.length);
    for (let i = 0; i < periods; i++) {
        const op = operating[i];
        const rev = revenue[i];
        if (!isNumber(op) || !isNumber(rev) || rev === 0) continue;
        margins.push(op / rev);
    }

    if (margins.length === 0) return err('COMPUTATION', 'No period with a valid margin');
    return finite(margins.reduce((sum, m) => sum + m, 0) / margins.length, 'Average margin');
}

/**
 * EBIT / |interest expense|; NO_DEBT_COVERAGE when there is no interest expense.
 */
export function interestCoverage(ebit: number, interestExpense: number): Result<number> {
    const interest = Math.abs(interestExpense);
    if (interest === 0) return ok(NO_DEBT_COVERAGE);
    return finite(ebit / interest, 'Interest coverage');
}

/**
 * EBIT over (total assets - current liabilities); 0 when invested capital is not positive.
 */
export function returnOnInvestedCapital(
    ebit: number,
    totalAssets: number,
    currentLiabilities: number
): Result<number> {
    const investedCapital = totalAssets - currentLiabilities;
    if (!(investedCapital > 0)) return ok(0);
    return finite(ebit / investedCapital, 'ROIC');
}

export interface AltmanInputs {
    totalAssets: number;
    totalLiabilities: number;
    currentAssets: number;
    currentLiabilities: number;
    retainedEarnings: number;
    ebit: number;
    totalRevenue: number;
    marketCap: number;
}

/**
 * Altman Z-Score (original manufacturing model)
 * Z > 2.99: Safe
 * 1.81 < Z < 2.99: Grey zone
 * Z < 1.81: Distress
 */
export function computeAltmanZ(inputs: AltmanInputs): Result<number> {
    const { totalAssets, totalLiabilities } = inputs;
    if (totalAssets === 0 || totalLiabilities === 0) {
        return err('COMPUTATION', 'Total assets or total liabilities is zero');
    }

    const a = (inputs.currentAssets - inputs.currentLiabilities) / totalAssets;
    const b = inputs.retainedEarnings / totalAssets;
    const c = inputs.ebit / totalAssets;
    const d = inputs.marketCap / totalLiabilities;
    const e = inputs.totalRevenue / totalAssets;

    return finite((1.2 * a) + (1.4 * b) + (3.3 * c) + (0.6 * d) + (1.0 * e), 'Altman Z');
}

export function altmanZFromStatements(
    balance: StatementTable,
    income: StatementTable,
    marketCap: number
): Result<number> {
    return computeAltmanZ({
        totalAssets: lookupFirst(balance, LINE_ITEMS.TOTAL_ASSETS),
        totalLiabilities: lookupFirst(balance, LINE_ITEMS.TOTAL_LIABILITIES),
        currentAssets: lookupFirst(balance, LINE_ITEMS.CURRENT_ASSETS),
        currentLiabilities: lookupFirst(balance, LINE_ITEMS.CURRENT_LIABILITIES),
        retainedEarnings: lookupFirst(balance, LINE_ITEMS.RETAINED_EARNINGS),
        ebit: lookupFirst(income, LINE_ITEMS.EBIT_STRICT),
        totalRevenue: lookupFirst(income, LINE_ITEMS.TOTAL_REVENUE),
        marketCap,
    });
}

/**
 * Simple moving average of the last `window` values; null when history is too short.
 */
export function simpleMovingAverage(values: number[], window: number): number | null {
    if (window <= 0 || values.length < window) return null;
    let sum = 0;
    for (let i = values.length - window; i < values.length; i++) {
        sum += values[i];
    }
    return sum / window;
}
