import type { HealthResponse } from '@hybrid-retrieval/types';
import { DocumentRepository } from '../../domain/entities/DocumentRepository';
import { RepositoryProvider } from '../../infrastructure/repositories/RepositoryProvider';
import { CircuitBreaker } from '../resilience/CircuitBreaker';

export class CheckHealth {
    constructor(
        private repositories: RepositoryProvider,
        private breakers: CircuitBreaker[]
    ) {}

    async execute(): Promise<HealthResponse> {
        const database = await this.repositories.get(DocumentRepository).ping();
        const breakers = this.breakers.map((breaker) => breaker.snapshot());
        const healthy = database && breakers.every((breaker) => breaker.state !== 'open');

        return {
            status: healthy ? 'healthy' : 'degraded',
            database,
            breakers,
        };
    }
}
