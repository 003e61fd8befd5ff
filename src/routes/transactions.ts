import { Router, Request, Response } from 'express';
import Joi from 'joi';
import { RiskProfileService } from '../services/riskProfileService';
import { distinctCategories } from '../services/filterService';
import { ApiResponse, PaginatedResponse } from '../types/api';
import { CategoryStatistic, GlobalDistanceStatistic, ScoredTransaction } from '../types/transaction';
import { asyncHandler } from '../middleware/errorHandler';
import { selectView, validateQuery, viewQueryKeys, ViewQuery } from './viewQuery';

type SortKey = 'none' | 'zScore' | 'amount' | 'distance';

interface ListQuery extends ViewQuery {
    sort: SortKey;
    limit: number;
    offset: number;
}

const listQuerySchema = Joi.object<ListQuery>({
    ...viewQueryKeys,
    sort: Joi.string().valid('none', 'zScore', 'amount', 'distance').default('none'),
    limit: Joi.number().integer().min(1).max(1000).default(100),
    offset: Joi.number().integer().min(0).default(0)
});

const sortValue = (tx: ScoredTransaction, key: Exclude<SortKey, 'none'>): number | null => {
    switch (key) {
        case 'zScore':
            return tx.amountZScore;
        case 'amount':
            return tx.amount;
        case 'distance':
            return tx.distanceKm !== null && Number.isFinite(tx.distanceKm) ? tx.distanceKm : null;
    }
};

// Descending, nulls last. Sorting happens on the filtered copy only.
const sortView = (view: ScoredTransaction[], key: SortKey): ScoredTransaction[] => {
    if (key === 'none') {
        return view;
    }
    return view.sort((a, b) => {
        const left = sortValue(a, key);
        const right = sortValue(b, key);
        if (left === null || right === null) {
            return Number(left === null) - Number(right === null);
        }
        return right - left;
    });
};

export const createTransactionRoutes = (riskProfiles: RiskProfileService): Router => {
    const router = Router();

    router.get('/', asyncHandler((req: Request, res: Response) => {
        const query = validateQuery(listQuerySchema, req.query);
        const snapshot = riskProfiles.getSnapshot();

        const view = sortView(selectView(query, snapshot), query.sort);
        const page = view.slice(query.offset, query.offset + query.limit);

        const response: PaginatedResponse<ScoredTransaction[]> = {
            success: true,
            data: page,
            pagination: {
                offset: query.offset,
                limit: query.limit,
                total: view.length
            },
            timestamp: new Date().toISOString()
        };
        res.json(response);
    }));

    router.get('/categories', asyncHandler((req: Request, res: Response) => {
        const snapshot = riskProfiles.getSnapshot();

        const response: ApiResponse<string[]> = {
            success: true,
            data: distinctCategories(snapshot.transactions),
            timestamp: new Date().toISOString()
        };
        res.json(response);
    }));

    router.get('/statistics', asyncHandler((req: Request, res: Response) => {
        const snapshot = riskProfiles.getSnapshot();

        const response: ApiResponse<{
            evaluatedAt: string;
            categories: readonly CategoryStatistic[];
            distance: GlobalDistanceStatistic | null;
        }> = {
            success: true,
            data: {
                evaluatedAt: snapshot.evaluatedAt,
                categories: snapshot.categoryStatistics,
                distance: snapshot.distanceStatistic
            },
            timestamp: new Date().toISOString()
        };
        res.json(response);
    }));

    return router;
};
