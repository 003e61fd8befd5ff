import { RawTransaction, EnrichedTransaction } from '../types/transaction';
import { computeAge, hourOfDay, toIsoString } from '../utils/dates';
import { haversineDistanceKm } from '../utils/geo';
import { logger } from '../config/logger';

export class FeatureService {

    /**
     * Row-local features. Output has the input's length and order; a row
     * whose dates or coordinates did not parse keeps null features.
     */
    enrichTransactions(
        transactions: readonly RawTransaction[],
        evaluationInstant: Date
    ): EnrichedTransaction[] {
        const enriched = transactions.map(tx => this.enrichTransaction(tx, evaluationInstant));

        logger.debug('Features extracted', {
            transactions: enriched.length,
            evaluationInstant: evaluationInstant.toISOString()
        });

        return enriched;
    }

    enrichTransaction(transaction: RawTransaction, evaluationInstant: Date): EnrichedTransaction {
        return {
            ...transaction,
            transactionTime: toIsoString(transaction.transactionTime),
            dateOfBirth: toIsoString(transaction.dateOfBirth),
            age: computeAge(transaction.dateOfBirth, evaluationInstant),
            hourOfDay: hourOfDay(transaction.transactionTime),
            distanceKm: this.calculateDistance(transaction)
        };
    }

    private calculateDistance(transaction: RawTransaction): number | null {
        const { cardholderLatitude, cardholderLongitude, merchantLatitude, merchantLongitude } = transaction;

        if (
            cardholderLatitude === null
            || cardholderLongitude === null
            || merchantLatitude === null
            || merchantLongitude === null
        ) {
            return null;
        }

        return haversineDistanceKm(cardholderLatitude, cardholderLongitude, merchantLatitude, merchantLongitude);
    }
}
