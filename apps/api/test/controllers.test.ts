import { describe, it, expect, beforeEach } from 'vitest';
import { ZodError } from 'zod';
import { SearchController } from '../src/infrastructure/http/controllers/SearchController';
import { DocumentController } from '../src/infrastructure/http/controllers/DocumentController';
import { HealthController } from '../src/infrastructure/http/controllers/HealthController';
import { SearchDocuments } from '../src/application/useCases/SearchDocuments';
import { SearchWithSummary } from '../src/application/useCases/summary/SearchWithSummary';
import { SummaryPipeline } from '../src/application/useCases/summary/SummaryPipeline';
import { PromptBuilder } from '../src/application/useCases/summary/PromptBuilder';
import { IngestDocument } from '../src/application/useCases/IngestDocument';
import { DeleteTenantDocuments } from '../src/application/useCases/DeleteTenantDocuments';
import { CheckHealth } from '../src/application/useCases/CheckHealth';
import { SearchOrchestrator } from '../src/application/services/SearchOrchestrator';
import { RankFuser } from '../src/application/services/RankFuser';
import { CircuitBreaker } from '../src/application/resilience/CircuitBreaker';
import { DeadlineGuard } from '../src/application/resilience/DeadlineGuard';
import { DocumentRepository } from '../src/domain/entities/DocumentRepository';
import { RetrievalFailureError } from '../src/domain/errors/RetrievalErrors';
import { LazyRepositoryProvider } from '../src/infrastructure/repositories/RepositoryProvider';
import { InMemoryDocumentRepository } from './helpers/InMemoryDocumentRepository';
import { FakeVectorProvider, ScriptedLLMProvider, createDocument } from './helpers/fakes';
import { ResponseDouble, asResponse, mockRequest } from './helpers/http';

describe('Controllers', () => {
    let repository: InMemoryDocumentRepository;
    let repositories: LazyRepositoryProvider;
    let vectorProvider: FakeVectorProvider;
    let storeBreaker: CircuitBreaker;
    let llmBreaker: CircuitBreaker;

    beforeEach(async () => {
        repository = new InMemoryDocumentRepository();
        repositories = new LazyRepositoryProvider();
        repositories.register(DocumentRepository, () => repository);
        vectorProvider = new FakeVectorProvider();
        storeBreaker = new CircuitBreaker({ name: 'vector-store' });
        llmBreaker = new CircuitBreaker({ name: 'llm' });

        await repository.save(createDocument('tenant-a', 'doc-1', 'postgres connection pooling guide'));
        await repository.save(createDocument('tenant-a', 'doc-2', 'tuning hnsw indexes for vector search'));
    });

    describe('SearchController', () => {
        const createController = (tokens: string[]) => {
            const orchestrator = new SearchOrchestrator(repository, vectorProvider, storeBreaker, new DeadlineGuard(), new RankFuser());
            const pipeline = new SummaryPipeline(orchestrator, new ScriptedLLMProvider(tokens), llmBreaker, new DeadlineGuard(), new PromptBuilder());
            return new SearchController(new SearchDocuments(orchestrator), new SearchWithSummary(pipeline));
        };

        it('should respond with the fused results', async () => {
            const res = new ResponseDouble();

            await createController([]).search(
                mockRequest({ body: { tenantId: 'tenant-a', query: 'postgres pooling', topK: 1 } }),
                asResponse(res)
            );

            expect(res.statusCode).toBe(200);
            expect(res.body).toMatchObject({
                results: [{ documentId: 'doc-1', sources: ['dense', 'sparse'] }],
                degradedSources: [],
            });
        });

        it('should respond with the summary and its status', async () => {
            const res = new ResponseDouble();

            await createController(['Use a pool.']).summarize(
                mockRequest({ body: { tenantId: 'tenant-a', query: 'postgres pooling', topK: 5 } }),
                asResponse(res)
            );

            expect(res.body).toMatchObject({ summary: 'Use a pool.', summaryStatus: 'complete' });
        });

        it('should stream meta, tokens and done as server-sent events', async () => {
            const res = new ResponseDouble();

            await createController(['Use', ' a pool.']).stream(
                mockRequest({ body: { tenantId: 'tenant-a', query: 'postgres pooling', topK: 5 } }),
                asResponse(res)
            );

            expect(res.headers['content-type']).toBe('text/event-stream; charset=utf-8');
            expect(res.sseEvents()).toEqual(['meta', 'token', 'token', 'done']);
            expect(res.chunks).toContain('data: "Use"\n');
            expect(res.writableEnded).toBe(true);
        });

        it('should fail with a JSON error before opening the stream when search fails', async () => {
            repository.denseError = new Error('dense index offline');
            repository.sparseError = new Error('fulltext index offline');
            const res = new ResponseDouble();

            await expect(
                createController(['unused']).stream(
                    mockRequest({ body: { tenantId: 'tenant-a', query: 'postgres', topK: 5 } }),
                    asResponse(res)
                )
            ).rejects.toBeInstanceOf(RetrievalFailureError);
            expect(res.headers).toEqual({});
            expect(res.chunks).toEqual([]);
        });
    });

    describe('DocumentController', () => {
        const createController = () => new DocumentController(
            new IngestDocument(repositories, vectorProvider),
            new DeleteTenantDocuments(repositories)
        );

        it('should ingest a document and respond 201', async () => {
            const res = new ResponseDouble();

            await createController().create(
                mockRequest({ body: { tenantId: 'tenant-b', documentId: 'doc-7', content: 'cache eviction notes', metadata: {} } }),
                asResponse(res)
            );

            expect(res.statusCode).toBe(201);
            expect(res.body).toMatchObject({ status: 'success', tenantId: 'tenant-b', documentId: 'doc-7' });
            expect(repository.count('tenant-b')).toBe(1);
        });

        it('should delete every document of a tenant', async () => {
            const res = new ResponseDouble();

            await createController().deleteByTenant(mockRequest({ params: { tenantId: 'tenant-a' } }), asResponse(res));

            expect(res.body).toEqual({ status: 'success', tenantId: 'tenant-a', deletedCount: 2 });
        });

        it('should reject an empty tenant id', async () => {
            await expect(
                createController().deleteByTenant(mockRequest({ params: { tenantId: '  ' } }), asResponse(new ResponseDouble()))
            ).rejects.toBeInstanceOf(ZodError);
            expect(repository.count('tenant-a')).toBe(2);
        });
    });

    describe('HealthController', () => {
        it('should respond 200 when healthy', async () => {
            const res = new ResponseDouble();

            await new HealthController(new CheckHealth(repositories, [storeBreaker, llmBreaker])).handle(mockRequest(), asResponse(res));

            expect(res.statusCode).toBe(200);
            expect(res.body).toMatchObject({ status: 'healthy', database: true });
        });

        it('should respond 503 when a breaker is open', async () => {
            for (let i = 0; i < 3; i++) llmBreaker.tryAcquire().fail();
            const res = new ResponseDouble();

            await new HealthController(new CheckHealth(repositories, [storeBreaker, llmBreaker])).handle(mockRequest(), asResponse(res));

            expect(res.statusCode).toBe(503);
            expect(res.body).toMatchObject({ status: 'degraded', breakers: [{ state: 'closed' }, { state: 'open' }] });
        });
    });
});
