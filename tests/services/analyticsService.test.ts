import { describe, it, expect } from '@jest/globals';
import { AnalyticsService, AGE_GROUPS } from '../../src/services/analyticsService';
import { scoredTransaction } from '../helpers/builders';

describe('AnalyticsService', () => {
    const analytics = new AnalyticsService();

    describe('summarize', () => {
        it('reduces a view to totals, rates and flag counts', () => {
            const view = [
                scoredTransaction({ amount: 100, isFraud: true, distanceKm: 10, isAmountAnomaly: true }),
                scoredTransaction({ amount: 50.5, isFraud: false, distanceKm: 30, isDistanceAnomaly: true }),
                scoredTransaction({ amount: null, isFraud: null, distanceKm: null }),
                scoredTransaction({ amount: 20, isFraud: false, distanceKm: Number.NaN })
            ];

            expect(analytics.summarize(view)).toEqual({
                transactionCount: 4,
                totalAmount: 170.5,
                fraudRate: 1 / 3,
                meanDistanceKm: 20,
                amountAnomalyCount: 1,
                distanceAnomalyCount: 1
            });
        });

        it('summarizes an empty view without dividing by zero', () => {
            expect(analytics.summarize([])).toEqual({
                transactionCount: 0,
                totalAmount: 0,
                fraudRate: null,
                meanDistanceKm: null,
                amountAnomalyCount: 0,
                distanceAnomalyCount: 0
            });
        });
    });

    describe('topAlerts', () => {
        it('orders by z-score descending, keeps ties stable and puts unscored rows last', () => {
            const view = [
                scoredTransaction({ merchant: 'a', amountZScore: 1.5 }),
                scoredTransaction({ merchant: 'b', amountZScore: null }),
                scoredTransaction({ merchant: 'c', amountZScore: 3 }),
                scoredTransaction({ merchant: 'd', amountZScore: -2 }),
                scoredTransaction({ merchant: 'e', amountZScore: 3 })
            ];

            expect(analytics.topAlerts(view, 10).map(tx => tx.merchant)).toEqual(['c', 'e', 'a', 'd', 'b']);
            expect(analytics.topAlerts(view, 3).map(tx => tx.merchant)).toEqual(['c', 'e', 'a']);
            expect(view.map(tx => tx.merchant)).toEqual(['a', 'b', 'c', 'd', 'e']);
        });
    });

    describe('riskMatrix', () => {
        it('counts fraud by right-closed age group and hour', () => {
            const matrix = analytics.riskMatrix([
                scoredTransaction({ isFraud: true, age: 25, hourOfDay: 3 }),
                scoredTransaction({ isFraud: true, age: 26, hourOfDay: 3 }),
                scoredTransaction({ isFraud: true, age: 61, hourOfDay: 23 }),
                scoredTransaction({ isFraud: false, age: 30, hourOfDay: 3 }),
                scoredTransaction({ isFraud: true, age: null, hourOfDay: 3 }),
                scoredTransaction({ isFraud: true, age: 0, hourOfDay: 1 }),
                scoredTransaction({ isFraud: true, age: 101, hourOfDay: 1 })
            ]);

            expect(matrix.ageGroups).toEqual(AGE_GROUPS.map(group => group.label));
            expect(matrix.hours).toHaveLength(24);
            expect(matrix.fraudCounts[0][3]).toBe(1);
            expect(matrix.fraudCounts[1][3]).toBe(1);
            expect(matrix.fraudCounts[3][23]).toBe(1);
            expect(matrix.fraudCounts.flat().reduce((sum, n) => sum + n, 0)).toBe(3);
        });
    });

    describe('zScoreHistogram', () => {
        it('spreads scores over equal-width bins, the last bin closed', () => {
            const bins = analytics.zScoreHistogram([
                scoredTransaction({ amountZScore: 0 }),
                scoredTransaction({ amountZScore: 1 }),
                scoredTransaction({ amountZScore: 2 }),
                scoredTransaction({ amountZScore: 4, isFraud: true }),
                scoredTransaction({ amountZScore: null })
            ], 4);

            expect(bins).toEqual([
                { from: 0, to: 1, count: 1, fraudCount: 0 },
                { from: 1, to: 2, count: 1, fraudCount: 0 },
                { from: 2, to: 3, count: 1, fraudCount: 0 },
                { from: 3, to: 4, count: 1, fraudCount: 1 }
            ]);
        });

        it('puts identical scores in the first bin', () => {
            const bins = analytics.zScoreHistogram([
                scoredTransaction({ amountZScore: 2 }),
                scoredTransaction({ amountZScore: 2 })
            ], 3);

            expect(bins.map(bin => bin.count)).toEqual([2, 0, 0]);
        });

        it('is empty when nothing is scored', () => {
            expect(analytics.zScoreHistogram([], 25)).toEqual([]);
        });
    });
});
