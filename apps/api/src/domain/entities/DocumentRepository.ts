import { TenantDocument } from './TenantDocument';

export interface DocumentSearchResult {
    document: TenantDocument;
    score: number;
    rank: number;
}

export interface RetrievalOptions {
    signal?: AbortSignal;
    timeoutMs?: number;
}

/**
 * Every read is scoped to a single tenant; implementations must filter on
 * tenantId server-side.
 */
export abstract class DocumentRepository {
    abstract save(document: TenantDocument): Promise<void>;
    abstract denseSearch(tenantId: string, queryVector: number[], limit: number, options?: RetrievalOptions): Promise<DocumentSearchResult[]>;
    abstract sparseSearch(tenantId: string, query: string, limit: number, options?: RetrievalOptions): Promise<DocumentSearchResult[]>;
    abstract deleteByTenant(tenantId: string): Promise<number>;
    abstract ping(): Promise<boolean>;
}
