import express from 'express';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import cors from 'cors';
import { errorHandler } from './infrastructure/http/middleware/errorHandler';
import { Core } from './infrastructure/Core';
import { SegmentController } from './infrastructure/http/controllers/SegmentController';
import { SearchController } from './infrastructure/http/controllers/SearchController';
import type { Controller } from './infrastructure/http/interfaces/Controller';
import { IndexSegments } from './application/useCases/IndexSegments';
import { SearchChunks } from './application/useCases/SearchChunks';
import logger from './infrastructure/logger';

export class App {
    public app: express.Application;

    constructor(private core: Core = new Core()) {
        this.app = express();

        this.initializeMiddlewares();
        this.initializeControllers();
        this.initializeErrorHandling();
    }

    private initializeMiddlewares() {
        this.app.use(helmet());
        this.app.use(express.json({ limit: '10mb' }));

        const limiter = rateLimit({
            windowMs: 15 * 60 * 1000, // 15 minutes
            limit: 100, // Limit each IP to 100 requests per windowMs
            standardHeaders: true,
            legacyHeaders: false,
        });
        this.app.use(limiter);

        this.app.use(cors({
            origin: process.env.CORS_ORIGIN || '*',
            methods: ['GET', 'POST', 'OPTIONS'],
        }));
    }

    private initializeControllers() {
        this.app.get('/health', (_req, res) => {
            res.json({ status: 'ok' });
        });

        const controllers: Controller[] = [
            new SegmentController(this.core.getUseCase(IndexSegments)),
            new SearchController(this.core.getUseCase(SearchChunks)),
        ];
        controllers.forEach((controller) => {
            this.app.use('/', controller.router);
        });
    }

    private initializeErrorHandling() {
        this.app.use(errorHandler);
    }

    public listen() {
        const port = Number(process.env.PORT || 6060);
        return this.app.listen(port, () => {
            logger.info(`🚀 Server running on http://localhost:${port}`);
        });
    }
}
