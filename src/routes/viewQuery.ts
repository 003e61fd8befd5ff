import Joi from 'joi';
import { ValidationError } from '../middleware/errorHandler';
import { filterTransactions, distinctCategories } from '../services/filterService';
import { FilterCriteria, RiskSnapshot, ScoredTransaction } from '../types/transaction';

export interface ViewQuery {
    categories?: string | string[];
    anomaliesOnly: boolean;
}

export const viewQueryKeys = {
    categories: Joi.alternatives(
        Joi.array().items(Joi.string().allow('')),
        Joi.string().allow('')
    ).optional(),
    anomaliesOnly: Joi.boolean().default(false)
};

export const validateQuery = <T>(schema: Joi.ObjectSchema<T>, query: unknown): T => {
    const { error, value } = schema.validate(query);
    if (error) {
        throw new ValidationError(`Invalid query parameters: ${error.details[0].message}`);
    }
    return value;
};

/**
 * `categories` is a comma separated list, or repeated once per category; a
 * repeated value is taken verbatim, commas and blanks included. Leaving it
 * out selects every category in the snapshot, a single empty value selects
 * none.
 */
export const toCriteria = (query: ViewQuery, snapshot: RiskSnapshot): FilterCriteria => ({
    categories: query.categories === undefined
        ? distinctCategories(snapshot.transactions)
        : Array.isArray(query.categories)
            ? query.categories
            : query.categories.split(',').map(category => category.trim()).filter(Boolean),
    anomaliesOnly: query.anomaliesOnly
});

export const selectView = (query: ViewQuery, snapshot: RiskSnapshot): ScoredTransaction[] =>
    filterTransactions(snapshot.transactions, toCriteria(query, snapshot));
