import { Router, type Request, type Response } from 'express';
import { searchRequestSchema, type SearchRequest, type SummaryStreamEvent } from '@hybrid-retrieval/types';
import { SearchDocuments } from '../../../application/useCases/SearchDocuments';
import { SearchWithSummary } from '../../../application/useCases/summary/SearchWithSummary';
import type { Controller } from '../interfaces/Controller';
import { summaryRateLimiter } from '../middleware/rateLimiter';
import { validateRequest } from '../middleware/validateRequest';
import { requestSignal } from '../requestSignal';
import logger from '../../logger';

type StreamError = { code: 'STREAM_ERROR'; message?: string };

export class SearchController implements Controller {
    public path = '/search';
    public router: Router = Router();

    constructor(
        private searchDocuments: SearchDocuments,
        private searchWithSummary: SearchWithSummary
    ) {
        this.initializeRoutes();
    }

    private initializeRoutes() {
        const validate = validateRequest(searchRequestSchema);
        this.router.post(`${this.path}`, validate, this.search.bind(this));
        this.router.post(`${this.path}-with-summary`, summaryRateLimiter, validate, this.summarize.bind(this));
        this.router.post(`${this.path}-with-summary/stream`, summaryRateLimiter, validate, this.stream.bind(this));
    }

    async search(req: Request, res: Response) {
        const request: SearchRequest = req.body;
        const response = await this.searchDocuments.execute(request, { signal: requestSignal(res) });
        res.json(response);
    }

    async summarize(req: Request, res: Response) {
        const request: SearchRequest = req.body;
        const response = await this.searchWithSummary.execute(request, { signal: requestSignal(res) });
        res.json(response);
    }

    async stream(req: Request, res: Response) {
        const request: SearchRequest = req.body;
        const signal = requestSignal(res);
        const events = this.searchWithSummary.executeStream(request, { signal });

        // Retrieval runs before the first event, so a failed search still gets a JSON error response
        const first = await events.next();

        // ─────────────────────────────────────────────
        // SSE headers
        // ─────────────────────────────────────────────
        res.setHeader('Content-Type', 'text/event-stream; charset=utf-8');
        res.setHeader('Cache-Control', 'no-cache, no-transform');
        res.setHeader('Connection', 'keep-alive');
        res.setHeader('X-Accel-Buffering', 'no');
        res.flushHeaders();

        const sendEvent = (event: string, data?: unknown) => {
            if (res.writableEnded) return;
            res.write(`event: ${event}\n`);
            if (data !== undefined) {
                res.write(`data: ${JSON.stringify(data)}\n`);
            }
            res.write('\n');
        };

        const forward = (event: SummaryStreamEvent) => {
            if (event.type === 'token') {
                sendEvent('token', event.content);
            } else if (event.type === 'meta') {
                sendEvent('meta', {
                    results: event.results,
                    searchLatencyMs: event.searchLatencyMs,
                    degradedSources: event.degradedSources,
                });
            } else {
                sendEvent('done', {
                    summaryStatus: event.summaryStatus,
                    degradedReason: event.degradedReason,
                    searchLatencyMs: event.searchLatencyMs,
                    llmLatencyMs: event.llmLatencyMs,
                });
            }
        };

        try {
            if (!first.done) forward(first.value);

            for await (const event of events) {
                if (signal.aborted) break;
                forward(event);
            }
        } catch (err) {
            logger.error('Summary stream failed', {
                tenantId: request.tenantId,
                error: err instanceof Error ? err.message : String(err),
            });
            if (!signal.aborted) {
                sendEvent('error', {
                    code: 'STREAM_ERROR',
                    message: 'Failed generating summary',
                } satisfies StreamError);
            }
        } finally {
            res.end();
        }
    }
}
