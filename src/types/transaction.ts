export interface RawTransaction {
    transactionTime: Date | null;
    category: string;
    amount: number | null;
    cardholderLatitude: number | null;
    cardholderLongitude: number | null;
    merchantLatitude: number | null;
    merchantLongitude: number | null;
    dateOfBirth: Date | null;
    isFraud: boolean | null;
    merchant: string;
}

/**
 * Timestamps are carried as ISO-8601 strings from here on so a published
 * snapshot holds no mutable Date objects.
 */
export interface EnrichedTransaction extends Omit<RawTransaction, 'transactionTime' | 'dateOfBirth'> {
    transactionTime: string | null;
    dateOfBirth: string | null;
    age: number | null;
    hourOfDay: number | null;
    distanceKm: number | null;
}

export interface ScoredTransaction extends EnrichedTransaction {
    amountZScore: number | null;
    isAmountAnomaly: boolean;
    isDistanceAnomaly: boolean;
}

export interface CategoryStatistic {
    category: string;
    count: number;
    meanAmount: number;
    stdDevAmount: number;
}

export interface GlobalDistanceStatistic {
    count: number;
    meanDistanceKm: number;
    stdDevDistanceKm: number;
    thresholdKm: number;
}

export interface FilterCriteria {
    categories: ReadonlySet<string> | readonly string[];
    anomaliesOnly: boolean;
}

export interface ScoringResult {
    transactions: readonly ScoredTransaction[];
    categoryStatistics: readonly CategoryStatistic[];
    distanceStatistic: GlobalDistanceStatistic | null;
}

export interface RiskSnapshot extends ScoringResult {
    /** ISO-8601 */
    evaluatedAt: string;
    source: string;
    warnings: number;
}
