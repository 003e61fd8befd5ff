import { Router, Request, Response } from 'express';
import { RiskProfileService } from '../services/riskProfileService';
import { Settings } from '../config/settings';
import { asyncHandler } from '../middleware/errorHandler';
import { logger } from '../config/logger';
import { createTransactionRoutes } from './transactions';
import { createAnalyticsRoutes } from './analytics';

export const createRoutes = (riskProfiles: RiskProfileService, settings: Settings): Router => {
    const router = Router();

    router.use('/transactions', createTransactionRoutes(riskProfiles));
    router.use('/analytics', createAnalyticsRoutes(riskProfiles, settings.topAlertsLimit));

    router.post('/snapshot/reload', asyncHandler(async (req: Request, res: Response) => {
        const snapshot = await riskProfiles.reload(settings.dataFile, settings.evaluationDate);

        logger.info('Snapshot reloaded on request', { source: snapshot.source });
        res.json({
            success: true,
            data: {
                source: snapshot.source,
                transactions: snapshot.transactions.length,
                categories: snapshot.categoryStatistics.length,
                warnings: snapshot.warnings,
                evaluatedAt: snapshot.evaluatedAt
            },
            timestamp: new Date().toISOString()
        });
    }));

    router.get('/', (req: Request, res: Response) => {
        res.json({
            name: 'Transaction Risk Profiler API',
            version: '1.0.0',
            description: 'Enriched per-transaction risk profiles with amount and distance anomaly signals',
            endpoints: {
                'GET /api/transactions': 'Filtered, optionally sorted scored transactions',
                'GET /api/transactions/categories': 'Distinct categories in the loaded batch',
                'GET /api/transactions/statistics': 'Per-category amount and global distance statistics',

                'GET /api/analytics/summary': 'Totals, fraud rate, mean distance and anomaly counts for a view',
                'GET /api/analytics/top-alerts': 'Highest amount z-scores in a view',
                'GET /api/analytics/risk-matrix': 'Fraud counts by age group and hour of day',
                'GET /api/analytics/z-score-histogram': 'Distribution of amount z-scores',

                'POST /api/snapshot/reload': 'Re-read and re-score the data file',

                'GET /health': 'System health check',
                'GET /api': 'This API information'
            },
            filters: {
                categories: 'comma separated list, or repeat the parameter once per category to select names that contain commas or are blank; omit for all categories',
                anomaliesOnly: 'true to keep only amount or distance anomalies'
            },
            timestamp: new Date().toISOString(),
            environment: settings.nodeEnv
        });
    });

    router.get('/status', (req: Request, res: Response) => {
        res.json({
            status: riskProfiles.hasSnapshot() ? 'OK' : 'NO_DATA',
            timestamp: new Date().toISOString(),
            uptime: process.uptime(),
            version: '1.0.0'
        });
    });

    return router;
};
