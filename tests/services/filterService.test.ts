import { describe, it, expect } from '@jest/globals';
import { filterTransactions, distinctCategories, isAnomalous } from '../../src/services/filterService';
import { scoredTransaction } from '../helpers/builders';

describe('filterTransactions', () => {
    const batch = [
        scoredTransaction({ merchant: 'a', category: 'grocery', amountZScore: 0.1 }),
        scoredTransaction({ merchant: 'b', category: 'travel', amountZScore: 2.5, isAmountAnomaly: true }),
        scoredTransaction({ merchant: 'c', category: 'grocery', amountZScore: -0.4, isDistanceAnomaly: true }),
        scoredTransaction({ merchant: 'd', category: 'gas', amountZScore: 1.2 })
    ];
    const merchants = (rows: { merchant: string }[]) => rows.map(tx => tx.merchant);

    it('returns the whole batch in order for every category without the anomaly restriction', () => {
        const result = filterTransactions(batch, {
            categories: distinctCategories(batch),
            anomaliesOnly: false
        });

        expect(result).toEqual(batch);
        expect(result).not.toBe(batch);
    });

    it('returns nothing for an empty selection', () => {
        expect(filterTransactions(batch, { categories: [], anomaliesOnly: false })).toEqual([]);
        expect(filterTransactions(batch, { categories: new Set<string>(), anomaliesOnly: true })).toEqual([]);
    });

    it('returns nothing for a category with no rows', () => {
        expect(filterTransactions(batch, { categories: ['entertainment'], anomaliesOnly: false })).toEqual([]);
    });

    it('selects by category and keeps relative order', () => {
        expect(merchants(filterTransactions(batch, { categories: ['grocery'], anomaliesOnly: false }))).toEqual(['a', 'c']);
    });

    it('keeps rows with either anomaly flag when restricted to anomalies', () => {
        const result = filterTransactions(batch, { categories: new Set(['grocery', 'travel', 'gas']), anomaliesOnly: true });
        expect(merchants(result)).toEqual(['b', 'c']);
    });

    it('lets callers sort the result without touching the batch', () => {
        const result = filterTransactions(batch, { categories: ['grocery', 'travel', 'gas'], anomaliesOnly: false });
        result.sort((x, y) => (y.amountZScore ?? 0) - (x.amountZScore ?? 0));

        expect(merchants(result)).toEqual(['b', 'd', 'a', 'c']);
        expect(merchants(batch)).toEqual(['a', 'b', 'c', 'd']);
    });
});

describe('distinctCategories', () => {
    it('lists categories in order of first appearance', () => {
        expect(distinctCategories([
            scoredTransaction({ category: 'travel' }),
            scoredTransaction({ category: 'grocery' }),
            scoredTransaction({ category: 'travel' })
        ])).toEqual(['travel', 'grocery']);
    });
});

describe('isAnomalous', () => {
    it('is true when either flag is set', () => {
        expect(isAnomalous(scoredTransaction())).toBe(false);
        expect(isAnomalous(scoredTransaction({ isAmountAnomaly: true }))).toBe(true);
        expect(isAnomalous(scoredTransaction({ isDistanceAnomaly: true }))).toBe(true);
    });
});
