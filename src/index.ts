import { createApp } from './app';
import { logger } from './config/logger';
import { loadSettings } from './config/settings';
import { RiskProfileService } from './services/riskProfileService';

const start = async (): Promise<void> => {
    const settings = loadSettings();
    logger.level = settings.logLevel;
    const riskProfiles = new RiskProfileService();

    // Nothing is served until the whole batch has been enriched and scored.
    await riskProfiles.reload(settings.dataFile, settings.evaluationDate);

    const app = createApp(riskProfiles, settings);

    const server = app.listen(settings.port, () => {
        logger.info(`Transaction Risk Profiler running on port ${settings.port}`);
        logger.info(`Health check: http://localhost:${settings.port}/health`);
        logger.info(`API Base URL: http://localhost:${settings.port}/api`);
    });

    const shutdown = (signal: string) => {
        logger.info(`${signal} signal received: closing HTTP server`);
        server.close(() => {
            logger.info('HTTP server closed');
            process.exit(0);
        });
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
};

start().catch((error: unknown) => {
    logger.error('Failed to start Transaction Risk Profiler', { error: error instanceof Error ? error.message : String(error) });
    process.exit(1);
});
