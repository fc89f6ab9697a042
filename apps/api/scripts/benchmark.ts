import 'dotenv/config';
import { ingestDocumentSchema } from '@hybrid-retrieval/types';
import { z } from 'zod';
import { Core } from '../src/infrastructure/Core';
import { IngestDocument } from '../src/application/useCases/IngestDocument';
import { DeleteTenantDocuments } from '../src/application/useCases/DeleteTenantDocuments';
import { SearchDocuments } from '../src/application/useCases/SearchDocuments';
import { SearchWithSummary } from '../src/application/useCases/summary/SearchWithSummary';
import { closeDatabase } from '../src/infrastructure/db';
import demoFixture from './fixtures/demo-documents.json';

const demoDocuments = z.array(ingestDocumentSchema).parse(demoFixture);

const queries = [
    { tenantId: 'acme', query: 'what happens when the database fails over' },
    { tenantId: 'acme', query: 'how does rank fusion merge results' },
    { tenantId: 'acme', query: 'cache hit ratio after deploy' },
    { tenantId: 'globex', query: 'when are expense reports due' },
];

function percentile(values: number[], p: number): number {
    const sorted = [...values].sort((a, b) => a - b);
    return sorted[Math.min(sorted.length - 1, Math.floor((p / 100) * sorted.length))] ?? 0;
}

async function seedData(core: Core) {
    console.log('🧹 Cleaning demo tenants before benchmark...');
    const deleteTenant = core.getUseCase(DeleteTenantDocuments);
    for (const tenantId of new Set(demoDocuments.map((document) => document.tenantId))) {
        await deleteTenant.execute(tenantId);
    }

    console.log('🌱 Seeding demo documents...');
    const ingest = core.getUseCase(IngestDocument);
    for (const document of demoDocuments) {
        await ingest.execute(document);
        console.log(`  ✅ Indexed: ${document.tenantId}/${document.documentId}`);
    }
}

async function runBenchmark() {
    console.log('🚀 Starting retrieval benchmark...');
    const core = new Core();

    await seedData(core);

    const search = core.getUseCase(SearchDocuments);
    const summarize = core.getUseCase(SearchWithSummary);
    const searchLatencies: number[] = [];

    for (let round = 0; round < 5; round++) {
        for (const { tenantId, query } of queries) {
            const result = await search.execute({ tenantId, query, topK: 3 });
            searchLatencies.push(result.latencyMs);
            if (round === 0) {
                console.log(`\n❓ [${tenantId}] ${query}`);
                result.results.forEach((hit) => {
                    console.log(`   ${hit.score.toFixed(5)} ${hit.documentId} (${hit.sources.join('+')})`);
                });
            }
        }
    }

    console.log(`\n📊 Search latency p50=${percentile(searchLatencies, 50)}ms p95=${percentile(searchLatencies, 95)}ms`);

    for (const { tenantId, query } of queries.slice(0, 2)) {
        const result = await summarize.execute({ tenantId, query, topK: 3 });
        console.log(`\n🤖 [${result.summaryStatus}${result.degradedReason ? `/${result.degradedReason}` : ''}] ${result.summary ?? '(no summary)'}`);
        console.log(`   search=${result.searchLatencyMs}ms llm=${result.llmLatencyMs}ms`);
    }

    console.log('\n🔌 Breakers:', [core.storeBreaker.snapshot(), core.llmBreaker.snapshot()]);
}

runBenchmark()
    .catch((error: unknown) => {
        console.error('❌ Benchmark failed:', error);
        process.exitCode = 1;
    })
    .finally(() => closeDatabase());
