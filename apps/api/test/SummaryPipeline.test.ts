import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { SearchRequest, SummaryStreamEvent } from '@hybrid-retrieval/types';
import { SearchOrchestrator } from '../src/application/services/SearchOrchestrator';
import { RankFuser } from '../src/application/services/RankFuser';
import { CircuitBreaker } from '../src/application/resilience/CircuitBreaker';
import { DeadlineGuard } from '../src/application/resilience/DeadlineGuard';
import { SummaryPipeline } from '../src/application/useCases/summary/SummaryPipeline';
import { SearchWithSummary } from '../src/application/useCases/summary/SearchWithSummary';
import { PromptBuilder } from '../src/application/useCases/summary/PromptBuilder';
import { InMemoryDocumentRepository } from './helpers/InMemoryDocumentRepository';
import { FakeVectorProvider, ScriptedLLMProvider, createDocument, type ScriptedStreamOptions } from './helpers/fakes';

describe('SearchWithSummary', () => {
    let repository: InMemoryDocumentRepository;
    let orchestrator: SearchOrchestrator;
    let llmBreaker: CircuitBreaker;
    let llm: ScriptedLLMProvider;

    const request: SearchRequest = { tenantId: 'tenant-a', query: 'vector search', topK: 5 };

    const createUseCase = (tokens: string[], options?: ScriptedStreamOptions, contextSize = 5) => {
        llm = new ScriptedLLMProvider(tokens, options);
        const pipeline = new SummaryPipeline(orchestrator, llm, llmBreaker, new DeadlineGuard(), new PromptBuilder(), {
            llmTimeoutMs: 2_000,
            contextSize,
        });
        return new SearchWithSummary(pipeline);
    };

    beforeEach(async () => {
        vi.useFakeTimers();
        repository = new InMemoryDocumentRepository();
        await repository.save(createDocument('tenant-a', 'doc-1', 'postgres connection pooling guide'));
        await repository.save(createDocument('tenant-a', 'doc-2', 'tuning hnsw indexes for vector search'));
        await repository.save(createDocument('tenant-a', 'doc-3', 'keyword search with tsvector ranking'));

        orchestrator = new SearchOrchestrator(
            repository,
            new FakeVectorProvider(),
            new CircuitBreaker({ name: 'vector-store' }),
            new DeadlineGuard(),
            new RankFuser()
        );
        llmBreaker = new CircuitBreaker({ name: 'llm', threshold: 3, cooldownMs: 30_000 });
    });

    it('should return the search results with a complete summary', async () => {
        const response = await createUseCase(['HNSW indexes ', 'speed up vector search.']).execute(request);
        const plain = await orchestrator.search(request);

        expect(response.results).toEqual(plain.results);
        expect(response).toMatchObject({
            summary: 'HNSW indexes speed up vector search.',
            summaryStatus: 'complete',
            degradedSources: [],
        });
        expect(response.degradedReason).toBeUndefined();
        expect(llmBreaker.snapshot().consecutiveFailures).toBe(0);
    });

    it('should skip generation and return immediately while the generation breaker is open', async () => {
        for (let i = 0; i < 3; i++) llmBreaker.tryAcquire().fail();

        const response = await createUseCase(['never sent']).execute(request);
        const plain = await orchestrator.search(request);

        expect(llm.calls).toHaveLength(0);
        expect(response.results).toEqual(plain.results);
        expect(response).toMatchObject({
            summary: null,
            summaryStatus: 'degraded',
            degradedReason: 'circuit_open',
            llmLatencyMs: 0,
            latencyMs: 0,
        });
    });

    it('should keep the partial summary when generation exceeds its deadline', async () => {
        const pending = createUseCase(['HNSW', ' indexes'], { delayMs: 1_500 }).execute(request);
        await vi.advanceTimersByTimeAsync(2_000);
        const response = await pending;

        expect(response).toMatchObject({
            summary: 'HNSW',
            summaryStatus: 'incomplete',
            degradedReason: 'timeout',
            llmLatencyMs: 2_000,
        });
        expect(response.results).toHaveLength(3);
        expect(llm.closed).toBe(1);
        expect(llmBreaker.snapshot().consecutiveFailures).toBe(1);
    });

    it('should degrade when the deadline passes before any output', async () => {
        const pending = createUseCase(['late'], { delayMs: 5_000 }).execute(request);
        await vi.advanceTimersByTimeAsync(2_000);
        const response = await pending;

        expect(response).toMatchObject({ summary: null, summaryStatus: 'degraded', degradedReason: 'timeout' });
        expect(response.results).toHaveLength(3);
    });

    it('should mark a summary incomplete when the backend fails mid-stream', async () => {
        const response = await createUseCase(['HNSW', ' indexes'], { failAt: 1 }).execute(request);

        expect(response).toMatchObject({ summary: 'HNSW', summaryStatus: 'incomplete', degradedReason: 'provider_error' });
        expect(llmBreaker.snapshot().consecutiveFailures).toBe(1);
    });

    it('should degrade when the backend fails before producing anything', async () => {
        const response = await createUseCase(['HNSW'], { failAt: 0 }).execute(request);

        expect(response).toMatchObject({ summary: null, summaryStatus: 'degraded', degradedReason: 'provider_error' });
    });

    it('should open the generation breaker after repeated failures', async () => {
        for (let i = 0; i < 3; i++) {
            await createUseCase(['x'], { failAt: 0 }).execute(request);
        }

        const response = await createUseCase(['fine']).execute(request);

        expect(llmBreaker.getState()).toBe('open');
        expect(response.degradedReason).toBe('circuit_open');
    });

    it('should stop generating when the caller cancels, without charging the breaker', async () => {
        const abortController = new AbortController();
        const pending = createUseCase(['HNSW'], { delayMs: 1_000 }).execute(request, { signal: abortController.signal });

        await vi.advanceTimersByTimeAsync(500);
        abortController.abort();
        const response = await pending;

        expect(response).toMatchObject({ summaryStatus: 'degraded', degradedReason: 'cancelled', llmLatencyMs: 500 });
        expect(llmBreaker.snapshot().consecutiveFailures).toBe(0);
    });

    it('should skip generation when nothing was found', async () => {
        const response = await createUseCase(['unused']).execute({ tenantId: 'tenant-empty', query: 'vector search', topK: 5 });

        expect(llm.calls).toHaveLength(0);
        expect(response).toMatchObject({ results: [], summary: null, summaryStatus: 'skipped' });
    });

    it('should feed only the configured number of results into the prompt', async () => {
        await createUseCase(['ok'], undefined, 2).execute({ ...request, topK: 3 });

        const [system, user] = llm.calls[0];
        expect(system.role).toBe('system');
        expect(system.content).toContain('[2] ');
        expect(system.content).not.toContain('[3] ');
        expect(user).toEqual({ role: 'user', content: 'Summarize the search results for the query: "vector search"' });
    });

    it('should stream results first, then tokens, then the final status', async () => {
        const events: SummaryStreamEvent[] = [];
        for await (const event of createUseCase(['HNSW', ' indexes']).executeStream(request)) {
            events.push(event);
        }

        expect(events.map((event) => event.type)).toEqual(['meta', 'token', 'token', 'done']);
        expect(events[1]).toEqual({ type: 'token', content: 'HNSW' });
        expect(events[3]).toMatchObject({ type: 'done', summaryStatus: 'complete' });
    });

    it('should close the backend stream when the consumer stops early', async () => {
        const stream = createUseCase(['HNSW', ' indexes', ' help']).executeStream(request);

        for await (const event of stream) {
            if (event.type === 'token') break;
        }

        await vi.waitFor(() => expect(llm.closed).toBe(1));
        expect(llmBreaker.snapshot().halfOpenTrialInFlight).toBe(false);
    });
});
