import { type Request, type Response, Router } from 'express';
import { indexSegmentsSchema, type IndexSegmentsRequest, type IndexSegmentsResponse } from '@clipsearch/types';
import type { IndexSegments } from '../../../application/useCases/IndexSegments';
import type { Controller } from '../interfaces/Controller';
import { validateRequest } from '../middleware/validateRequest';
import { indexingRateLimiter } from '../middleware/rateLimiter';

export class SegmentController implements Controller {
    public path = '/segments';
    public router = Router();

    constructor(private indexSegments: IndexSegments) {
        this.initializeRoutes();
    }

    private initializeRoutes() {
        this.router.post(
            `${this.path}/index`,
            indexingRateLimiter,
            validateRequest(indexSegmentsSchema),
            (req, res, next) => this.index(req, res).catch(next)
        );
    }

    async index(req: Request, res: Response) {
        const { segments, window, stride, dropExisting }: IndexSegmentsRequest = indexSegmentsSchema.parse(req.body);

        // Stop ingesting between batches once the client has gone away
        const abortController = new AbortController();
        const onClose = () => {
            if (!res.writableEnded) {
                abortController.abort();
            }
        };
        res.on('close', onClose);

        try {
            const report = await this.indexSegments.execute(segments, {
                window,
                stride,
                dropExisting,
                signal: abortController.signal,
            });
            const body: IndexSegmentsResponse = report;
            return res.status(201).json(body);
        } finally {
            res.off('close', onClose);
        }
    }
}
