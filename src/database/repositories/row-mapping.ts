import { StoreUnavailableError } from '@services/errors.js';

// Column readers for untyped pg rows. A column of the wrong type means the
// schema and the code disagree, which no caller can recover from.

export function readText(row: Record<string, unknown>, column: string): string {
    const value = row[column];
    if (typeof value !== 'string') {
        throw new StoreUnavailableError(`Column ${column} is not text`);
    }
    return value;
}

export function readNumber(row: Record<string, unknown>, column: string): number {
    const value = row[column];
    // pg returns NUMERIC and BIGINT as strings
    const parsed = typeof value === 'string' ? Number(value) : value;
    if (typeof parsed !== 'number' || !Number.isFinite(parsed)) {
        throw new StoreUnavailableError(`Column ${column} is not numeric`);
    }
    return parsed;
}
