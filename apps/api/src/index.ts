import 'dotenv/config';
import { validateSearchConfig } from './application/config/searchConfig';
import { closeDatabase } from './infrastructure/db';
import logger from './infrastructure/logger';
import { App } from './app';

validateSearchConfig();

const server = new App().listen();

const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    server.close(() => {
        closeDatabase()
            .then(() => process.exit(0))
            .catch((error: unknown) => {
                logger.error('Failed closing database pool', {
                    error: error instanceof Error ? error.message : String(error),
                });
                process.exit(1);
            });
    });
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
