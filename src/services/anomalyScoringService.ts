import {
    EnrichedTransaction,
    ScoredTransaction,
    CategoryStatistic,
    GlobalDistanceStatistic,
    ScoringResult
} from '../types/transaction';
import { logger } from '../config/logger';

export const Z_SCORE_EPSILON = 1e-9;
export const AMOUNT_Z_THRESHOLD = 2.0;
export const DISTANCE_SIGMA_MULTIPLIER = 2.0;

// Sums run over `value - shift`, shift being the first value seen, so that
// tightly clustered values keep their precision.
interface Accumulator {
    count: number;
    shift: number;
    sum: number;
    sumOfSquares: number;
}

export interface Moments {
    count: number;
    mean: number;
    stdDev: number;
}

const emptyAccumulator = (): Accumulator => ({ count: 0, shift: 0, sum: 0, sumOfSquares: 0 });

const accumulate = (acc: Accumulator, value: number): void => {
    if (acc.count === 0) {
        acc.shift = value;
    }
    const offset = value - acc.shift;
    acc.count += 1;
    acc.sum += offset;
    acc.sumOfSquares += offset * offset;
};

// Population moments; variance is clamped at zero against rounding.
const toMoments = (acc: Accumulator): Moments => {
    const meanOffset = acc.sum / acc.count;
    const variance = Math.max(0, acc.sumOfSquares / acc.count - meanOffset * meanOffset);
    return { count: acc.count, mean: acc.shift + meanOffset, stdDev: Math.sqrt(variance) };
};

export const calculateZScore = (amount: number, moments: Moments): number =>
    (amount - moments.mean) / (moments.stdDev + Z_SCORE_EPSILON);

/** Upper tail only; a distance equal to the threshold is not an anomaly. */
export const exceedsDistanceThreshold = (
    distanceKm: number | null,
    statistic: GlobalDistanceStatistic | null
): boolean => statistic !== null && distanceKm !== null && distanceKm > statistic.thresholdKm;

export class AnomalyScoringService {

    scoreTransactions(transactions: readonly EnrichedTransaction[]): ScoringResult {
        const categoryMoments = this.calculateCategoryMoments(transactions);
        const distanceStatistic = this.calculateDistanceStatistic(transactions);

        const scored = transactions.map(tx => this.scoreTransaction(tx, categoryMoments, distanceStatistic));

        const categoryStatistics: CategoryStatistic[] = Array.from(categoryMoments, ([category, moments]) => ({
            category,
            count: moments.count,
            meanAmount: moments.mean,
            stdDevAmount: moments.stdDev
        }));

        logger.debug('Batch scored', {
            transactions: scored.length,
            categories: categoryStatistics.length,
            amountAnomalies: scored.filter(tx => tx.isAmountAnomaly).length,
            distanceAnomalies: scored.filter(tx => tx.isDistanceAnomaly).length
        });

        return { transactions: scored, categoryStatistics, distanceStatistic };
    }

    calculateCategoryMoments(transactions: readonly EnrichedTransaction[]): Map<string, Moments> {
        const accumulators = new Map<string, Accumulator>();

        for (const tx of transactions) {
            if (tx.amount === null) {
                continue;
            }
            let acc = accumulators.get(tx.category);
            if (!acc) {
                acc = emptyAccumulator();
                accumulators.set(tx.category, acc);
            }
            accumulate(acc, tx.amount);
        }

        const moments = new Map<string, Moments>();
        for (const [category, acc] of accumulators) {
            moments.set(category, toMoments(acc));
        }
        return moments;
    }

    calculateDistanceStatistic(transactions: readonly EnrichedTransaction[]): GlobalDistanceStatistic | null {
        const acc = emptyAccumulator();

        for (const tx of transactions) {
            if (tx.distanceKm !== null && Number.isFinite(tx.distanceKm)) {
                accumulate(acc, tx.distanceKm);
            }
        }

        if (acc.count === 0) {
            return null;
        }

        const { count, mean, stdDev } = toMoments(acc);
        return {
            count,
            meanDistanceKm: mean,
            stdDevDistanceKm: stdDev,
            thresholdKm: mean + DISTANCE_SIGMA_MULTIPLIER * stdDev
        };
    }

    private scoreTransaction(
        tx: EnrichedTransaction,
        categoryMoments: ReadonlyMap<string, Moments>,
        distanceStatistic: GlobalDistanceStatistic | null
    ): ScoredTransaction {
        const moments = categoryMoments.get(tx.category);
        const amountZScore = tx.amount === null || moments === undefined
            ? null
            : calculateZScore(tx.amount, moments);

        return {
            ...tx,
            amountZScore,
            isAmountAnomaly: amountZScore !== null && amountZScore > AMOUNT_Z_THRESHOLD,
            isDistanceAnomaly: exceedsDistanceThreshold(tx.distanceKm, distanceStatistic)
        };
    }
}
