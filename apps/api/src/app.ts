import express from 'express';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import cors from 'cors';
import type { Server } from 'node:http';
import { errorHandler } from './infrastructure/http/middleware/errorHandler';
import { Core } from './infrastructure/Core';
import { SearchController } from './infrastructure/http/controllers/SearchController';
import { DocumentController } from './infrastructure/http/controllers/DocumentController';
import { HealthController } from './infrastructure/http/controllers/HealthController';
import { SearchDocuments } from './application/useCases/SearchDocuments';
import { SearchWithSummary } from './application/useCases/summary/SearchWithSummary';
import { IngestDocument } from './application/useCases/IngestDocument';
import { DeleteTenantDocuments } from './application/useCases/DeleteTenantDocuments';
import { CheckHealth } from './application/useCases/CheckHealth';
import logger from './infrastructure/logger';

export class App {
    public app: express.Application;
    private core = new Core();

    constructor() {
        this.app = express();

        this.initializeMiddlewares();
        this.initializeControllers();
        this.initializeErrorHandling();
    }

    private initializeMiddlewares() {
        this.app.use(helmet());
        this.app.use(express.json({ limit: '1mb' }));

        const limiter = rateLimit({
            windowMs: 15 * 60 * 1000, // 15 minutes
            limit: 1000, // Limit each IP to 1000 requests per windowMs
            standardHeaders: true,
            legacyHeaders: false,
        });
        this.app.use(limiter);

        this.app.use(cors({
            origin: process.env.CORS_ORIGIN || '*',
            methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
        }));
    }

    private initializeControllers() {
        const searchController = new SearchController(
            this.core.getUseCase(SearchDocuments),
            this.core.getUseCase(SearchWithSummary),
        );
        const documentController = new DocumentController(
            this.core.getUseCase(IngestDocument),
            this.core.getUseCase(DeleteTenantDocuments),
        );
        const healthController = new HealthController(this.core.getUseCase(CheckHealth));
        const controllers = [
            searchController,
            documentController,
            healthController,
        ];
        controllers.forEach((controller) => {
            this.app.use('/', controller.router);
        });
    }

    private initializeErrorHandling() {
        this.app.use(errorHandler);
    }

    public listen(): Server {
        const port = Number(process.env.PORT || 6060);
        return this.app.listen(port, () => {
            logger.info(`Server running on http://localhost:${port}`);
        });
    }
}
