import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { logger } from './config/logger';
import { Settings } from './config/settings';
import { errorHandler, NotFoundError } from './middleware/errorHandler';
import { RiskProfileService } from './services/riskProfileService';
import { HealthCheckResponse } from './types/api';
import { createRoutes } from './routes';

export const createApp = (riskProfiles: RiskProfileService, settings: Settings): Express => {
    const app = express();

    app.use(helmet({
        contentSecurityPolicy: false
    }));

    app.use(cors({
        origin: settings.nodeEnv === 'production' ? false : true,
        credentials: true
    }));

    app.use(express.json({ limit: '1mb' }));

    app.use((req, res, next) => {
        logger.info(`${req.method} ${req.path}`, {
            ip: req.ip,
            userAgent: req.get('User-Agent'),
            query: Object.keys(req.query).length > 0 ? req.query : undefined
        });
        next();
    });

    app.use('/api', createRoutes(riskProfiles, settings));

    app.get('/health', (req: Request, res: Response) => {
        const snapshot = riskProfiles.peekSnapshot();
        const health: HealthCheckResponse = {
            status: snapshot ? 'OK' : 'DEGRADED',
            timestamp: new Date().toISOString(),
            uptime: process.uptime(),
            memory: process.memoryUsage(),
            version: process.env.npm_package_version || '1.0.0',
            snapshot: {
                loaded: snapshot !== null,
                transactions: snapshot ? snapshot.transactions.length : 0,
                evaluatedAt: snapshot ? snapshot.evaluatedAt : null
            }
        };
        res.json(health);
    });

    app.use('*', (req: Request, res: Response, next: NextFunction) => {
        next(new NotFoundError(`Endpoint not found: ${req.method} ${req.originalUrl}`));
    });

    app.use(errorHandler);

    return app;
};
