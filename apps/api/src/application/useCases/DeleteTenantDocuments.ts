import type { DeleteTenantResponse } from '@hybrid-retrieval/types';
import { DocumentRepository } from '../../domain/entities/DocumentRepository';
import { RepositoryProvider } from '../../infrastructure/repositories/RepositoryProvider';
import logger from '../../infrastructure/logger';

export class DeleteTenantDocuments {
    constructor(private repositories: RepositoryProvider) {}

    async execute(tenantId: string): Promise<DeleteTenantResponse> {
        const deletedCount = await this.repositories.get(DocumentRepository).deleteByTenant(tenantId);

        logger.info('Tenant documents deleted', { tenantId, deletedCount });

        return { status: 'success', tenantId, deletedCount };
    }
}
