import { LazyRepositoryProvider } from './repositories/RepositoryProvider';
import { UseCaseProvider, type SConstructor } from '../application/useCases/UseCaseProvider';
import { DocumentRepository } from '../domain/entities/DocumentRepository';
import { DrizzleDocumentRepository } from './repositories/DrizzleDocumentRepository';
import { OllamaLLMProvider } from './providores/OllamaLLMProvider';
import { OllamaVectorProvider } from './providores/OllamaVectorProvider';
import { searchConfig } from '../application/config/searchConfig';
import { CircuitBreaker } from '../application/resilience/CircuitBreaker';
import { DeadlineGuard } from '../application/resilience/DeadlineGuard';
import { RankFuser } from '../application/services/RankFuser';
import { SearchOrchestrator } from '../application/services/SearchOrchestrator';
import { SearchDocuments } from '../application/useCases/SearchDocuments';
import { IngestDocument } from '../application/useCases/IngestDocument';
import { DeleteTenantDocuments } from '../application/useCases/DeleteTenantDocuments';
import { CheckHealth } from '../application/useCases/CheckHealth';
import { SearchWithSummary } from '../application/useCases/summary/SearchWithSummary';
import { SummaryPipeline } from '../application/useCases/summary/SummaryPipeline';
import { PromptBuilder } from '../application/useCases/summary/PromptBuilder';

export class Core {
    public repositories = new LazyRepositoryProvider();
    public useCases = new UseCaseProvider();
    private llmProvider = new OllamaLLMProvider();
    private vectorProvider = new OllamaVectorProvider();
    private deadlineGuard = new DeadlineGuard();

    // One breaker per downstream dependency, shared by every request
    public storeBreaker = new CircuitBreaker({
        name: 'vector-store',
        threshold: searchConfig.breakerFailureThreshold,
        cooldownMs: searchConfig.breakerCooldownMs,
    });
    public llmBreaker = new CircuitBreaker({
        name: 'llm',
        threshold: searchConfig.breakerFailureThreshold,
        cooldownMs: searchConfig.breakerCooldownMs,
    });

    constructor() {
        this.initializeRepositories();
        this.initializeServices();
    }

    private initializeRepositories() {
        this.repositories.register(DocumentRepository, () => new DrizzleDocumentRepository());
    }

    private initializeServices() {
        const orchestrator = () => new SearchOrchestrator(
            this.repositories.get(DocumentRepository),
            this.vectorProvider,
            this.storeBreaker,
            this.deadlineGuard,
            new RankFuser(searchConfig.rrfK),
            {
                rrfK: searchConfig.rrfK,
                budgetMs: searchConfig.searchTimeoutMs,
                branchTimeoutMs: searchConfig.branchTimeoutMs,
                candidateMultiplier: searchConfig.candidateMultiplier,
            }
        );

        this.useCases.register(SearchDocuments, () => new SearchDocuments(orchestrator()));
        this.useCases.register(SearchWithSummary, () => new SearchWithSummary(
            new SummaryPipeline(
                orchestrator(),
                this.llmProvider,
                this.llmBreaker,
                this.deadlineGuard,
                new PromptBuilder(),
                {
                    llmTimeoutMs: searchConfig.llmTimeoutMs,
                    contextSize: searchConfig.summaryContextSize,
                }
            )
        ));
        this.useCases.register(IngestDocument, () => new IngestDocument(
            this.repositories,
            this.vectorProvider,
        ));
        this.useCases.register(DeleteTenantDocuments, () => new DeleteTenantDocuments(this.repositories));
        this.useCases.register(CheckHealth, () => new CheckHealth(
            this.repositories,
            [this.storeBreaker, this.llmBreaker],
        ));
    }

    public getUseCase<T>(serviceType: SConstructor<T>): T {
        return this.useCases.get(serviceType);
    }
}
