import { FilterCriteria, ScoredTransaction } from '../types/transaction';

export const isAnomalous = (tx: ScoredTransaction): boolean =>
    tx.isAmountAnomaly || tx.isDistanceAnomaly;

/**
 * Stable selection over a scored batch. Always returns a fresh array, so a
 * caller may sort the result without disturbing the batch it came from.
 */
export const filterTransactions = <T extends ScoredTransaction>(
    transactions: readonly T[],
    criteria: FilterCriteria
): T[] => {
    const selected = new Set<string>(criteria.categories);

    return transactions.filter(tx =>
        selected.has(tx.category) && (!criteria.anomaliesOnly || isAnomalous(tx))
    );
};

export const distinctCategories = (transactions: readonly ScoredTransaction[]): string[] => {
    const seen = new Set<string>();
    for (const tx of transactions) {
        seen.add(tx.category);
    }
    return Array.from(seen);
};
