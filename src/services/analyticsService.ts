import { ScoredTransaction } from '../types/transaction';

export interface ViewSummary {
    transactionCount: number;
    totalAmount: number;
    /** Share of labelled rows marked fraudulent, 0..1; null when nothing is labelled. */
    fraudRate: number | null;
    meanDistanceKm: number | null;
    amountAnomalyCount: number;
    distanceAnomalyCount: number;
}

export interface AgeGroup {
    label: string;
    minExclusive: number;
    maxInclusive: number;
}

export const AGE_GROUPS: readonly AgeGroup[] = [
    { label: 'Youth (0-25)', minExclusive: 0, maxInclusive: 25 },
    { label: 'Adult (26-40)', minExclusive: 25, maxInclusive: 40 },
    { label: 'Senior (41-60)', minExclusive: 40, maxInclusive: 60 },
    { label: 'Elderly (60+)', minExclusive: 60, maxInclusive: 100 }
];

export interface RiskMatrix {
    ageGroups: string[];
    hours: number[];
    /** fraudCounts[ageGroupIndex][hour] */
    fraudCounts: number[][];
}

export interface HistogramBin {
    from: number;
    to: number;
    count: number;
    fraudCount: number;
}

const mean = (values: number[]): number | null =>
    values.length > 0 ? values.reduce((sum, value) => sum + value, 0) / values.length : null;

export class AnalyticsService {

    summarize(view: readonly ScoredTransaction[]): ViewSummary {
        const labels = view.flatMap(tx => tx.isFraud === null ? [] : [tx.isFraud ? 1 : 0]);
        const distances = view.flatMap(tx =>
            tx.distanceKm !== null && Number.isFinite(tx.distanceKm) ? [tx.distanceKm] : []
        );

        return {
            transactionCount: view.length,
            totalAmount: view.reduce((sum, tx) => sum + (tx.amount ?? 0), 0),
            fraudRate: mean(labels),
            meanDistanceKm: mean(distances),
            amountAnomalyCount: view.filter(tx => tx.isAmountAnomaly).length,
            distanceAnomalyCount: view.filter(tx => tx.isDistanceAnomaly).length
        };
    }

    /** Highest z-scores first; rows without a score go last. */
    topAlerts(view: readonly ScoredTransaction[], limit: number): ScoredTransaction[] {
        return [...view]
            .sort((a, b) => {
                if (a.amountZScore === null || b.amountZScore === null) {
                    return Number(a.amountZScore === null) - Number(b.amountZScore === null);
                }
                return b.amountZScore - a.amountZScore;
            })
            .slice(0, limit);
    }

    riskMatrix(view: readonly ScoredTransaction[]): RiskMatrix {
        const hours = Array.from({ length: 24 }, (_, hour) => hour);
        const fraudCounts = AGE_GROUPS.map(() => hours.map(() => 0));

        for (const tx of view) {
            if (!tx.isFraud || tx.age === null || tx.hourOfDay === null) {
                continue;
            }
            const groupIndex = this.ageGroupIndex(tx.age);
            if (groupIndex >= 0) {
                fraudCounts[groupIndex][tx.hourOfDay] += 1;
            }
        }

        return {
            ageGroups: AGE_GROUPS.map(group => group.label),
            hours,
            fraudCounts
        };
    }

    zScoreHistogram(view: readonly ScoredTransaction[], binCount: number): HistogramBin[] {
        const scored = view.filter(
            (tx): tx is ScoredTransaction & { amountZScore: number } =>
                tx.amountZScore !== null && Number.isFinite(tx.amountZScore)
        );
        if (scored.length === 0) {
            return [];
        }

        let min = Infinity;
        let max = -Infinity;
        for (const tx of scored) {
            min = Math.min(min, tx.amountZScore);
            max = Math.max(max, tx.amountZScore);
        }

        const width = (max - min) / binCount;
        const bins: HistogramBin[] = Array.from({ length: binCount }, (_, i) => ({
            from: min + i * width,
            to: i === binCount - 1 ? max : min + (i + 1) * width,
            count: 0,
            fraudCount: 0
        }));

        for (const tx of scored) {
            const index = width === 0
                ? 0
                : Math.min(binCount - 1, Math.floor((tx.amountZScore - min) / width));
            bins[index].count += 1;
            if (tx.isFraud) {
                bins[index].fraudCount += 1;
            }
        }

        return bins;
    }

    private ageGroupIndex(age: number): number {
        return AGE_GROUPS.findIndex(group => age > group.minExclusive && age <= group.maxInclusive);
    }
}
