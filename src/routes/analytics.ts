import { Router, Request, Response } from 'express';
import Joi from 'joi';
import { RiskProfileService } from '../services/riskProfileService';
import { AnalyticsService, HistogramBin, RiskMatrix, ViewSummary } from '../services/analyticsService';
import { ApiResponse } from '../types/api';
import { ScoredTransaction } from '../types/transaction';
import { asyncHandler } from '../middleware/errorHandler';
import { logger } from '../config/logger';
import { selectView, validateQuery, viewQueryKeys, ViewQuery } from './viewQuery';

interface TopAlertsQuery extends ViewQuery {
    limit: number;
}

interface HistogramQuery extends ViewQuery {
    bins: number;
}

const viewQuerySchema = Joi.object<ViewQuery>(viewQueryKeys);

const histogramQuerySchema = Joi.object<HistogramQuery>({
    ...viewQueryKeys,
    bins: Joi.number().integer().min(1).max(200).default(25)
});

const respond = <T>(res: Response, data: T): void => {
    const response: ApiResponse<T> = {
        success: true,
        data,
        timestamp: new Date().toISOString()
    };
    res.json(response);
};

export const createAnalyticsRoutes = (riskProfiles: RiskProfileService, topAlertsLimit: number): Router => {
    const router = Router();
    const analytics = new AnalyticsService();

    const topAlertsQuerySchema = Joi.object<TopAlertsQuery>({
        ...viewQueryKeys,
        limit: Joi.number().integer().min(1).max(1000).default(topAlertsLimit)
    });

    router.get('/summary', asyncHandler((req: Request, res: Response) => {
        const query = validateQuery(viewQuerySchema, req.query);
        const view = selectView(query, riskProfiles.getSnapshot());
        const summary = analytics.summarize(view);

        logger.debug('Summary computed', { transactions: summary.transactionCount, anomaliesOnly: query.anomaliesOnly });
        respond<ViewSummary>(res, summary);
    }));

    router.get('/top-alerts', asyncHandler((req: Request, res: Response) => {
        const query = validateQuery(topAlertsQuerySchema, req.query);
        const view = selectView(query, riskProfiles.getSnapshot());

        respond<ScoredTransaction[]>(res, analytics.topAlerts(view, query.limit));
    }));

    router.get('/risk-matrix', asyncHandler((req: Request, res: Response) => {
        const query = validateQuery(viewQuerySchema, req.query);
        const view = selectView(query, riskProfiles.getSnapshot());

        respond<RiskMatrix>(res, analytics.riskMatrix(view));
    }));

    router.get('/z-score-histogram', asyncHandler((req: Request, res: Response) => {
        const query = validateQuery(histogramQuerySchema, req.query);
        const view = selectView(query, riskProfiles.getSnapshot());

        respond<HistogramBin[]>(res, analytics.zScoreHistogram(view, query.bins));
    }));

    return router;
};
