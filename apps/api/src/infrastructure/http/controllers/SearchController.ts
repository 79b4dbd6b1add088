import { type Request, type Response, Router } from 'express';
import { searchChunksSchema, type SearchChunksResponse } from '@clipsearch/types';
import type { SearchChunks } from '../../../application/useCases/SearchChunks';
import type { Controller } from '../interfaces/Controller';
import { validateRequest } from '../middleware/validateRequest';

export class SearchController implements Controller {
    public path = '/search';
    public router = Router();

    constructor(private searchChunks: SearchChunks) {
        this.initializeRoutes();
    }

    private initializeRoutes() {
        this.router.post(
            `${this.path}`,
            validateRequest(searchChunksSchema),
            (req, res, next) => this.search(req, res).catch(next)
        );
    }

    async search(req: Request, res: Response) {
        const { query, limit } = searchChunksSchema.parse(req.body);
        const hits = await this.searchChunks.execute(query, { limit });
        const body: SearchChunksResponse = { hits };
        return res.json(body);
    }
}
