import type { IngestDocumentRequest, IngestDocumentResponse } from '@hybrid-retrieval/types';
import { DocumentRepository } from '../../domain/entities/DocumentRepository';
import { TenantDocument } from '../../domain/entities/TenantDocument';
import { RepositoryProvider } from '../../infrastructure/repositories/RepositoryProvider';
import logger from '../../infrastructure/logger';
import type { VectorProvider } from '../providers/VectorProvider';

export class IngestDocument {
    constructor(
        private repositories: RepositoryProvider,
        private vectorProvider: VectorProvider
    ) {}

    async execute(request: IngestDocumentRequest): Promise<IngestDocumentResponse> {
        const startTime = Date.now();

        const embedding = await this.vectorProvider.generateEmbedding(request.content);

        const document = new TenantDocument(
            request.tenantId,
            request.documentId,
            request.content,
            request.metadata,
            embedding,
            new Date()
        );

        await this.repositories.get(DocumentRepository).save(document);

        const latencyMs = Date.now() - startTime;
        logger.info('Document ingested', {
            tenantId: request.tenantId,
            documentId: request.documentId,
            latencyMs,
        });

        return {
            status: 'success',
            tenantId: request.tenantId,
            documentId: request.documentId,
            latencyMs,
        };
    }
}
