import { db, type DatabaseTransaction } from '../db';
import { documents } from '../db/schema';
import { TenantDocument } from '../../domain/entities/TenantDocument';
import { DocumentRepository, type DocumentSearchResult, type RetrievalOptions } from '../../domain/entities/DocumentRepository';
import { and, cosineDistance, desc, eq, sql } from 'drizzle-orm';
import logger from '../logger';

const documentColumns = {
    tenantId: documents.tenantId,
    documentId: documents.documentId,
    content: documents.content,
    metadata: documents.metadata,
    embedding: documents.embedding,
    createdAt: documents.createdAt,
};

interface DocumentRow {
    tenantId: string;
    documentId: string;
    content: string;
    metadata: Record<string, unknown>;
    embedding: number[];
    createdAt: Date;
}

const toDocument = (row: DocumentRow) => new TenantDocument(
    row.tenantId,
    row.documentId,
    row.content,
    row.metadata,
    row.embedding,
    row.createdAt
);

export class DrizzleDocumentRepository extends DocumentRepository {
    async save(document: TenantDocument): Promise<void> {
        await db
            .insert(documents)
            .values({
                tenantId: document.tenantId,
                documentId: document.documentId,
                content: document.content,
                metadata: document.metadata,
                embedding: document.embedding,
                createdAt: document.createdAt,
            })
            .onConflictDoUpdate({
                target: [documents.tenantId, documents.documentId],
                set: {
                    content: document.content,
                    metadata: document.metadata,
                    embedding: document.embedding,
                    updatedAt: new Date(),
                },
            });
    }

    async denseSearch(tenantId: string, queryVector: number[], limit: number, options: RetrievalOptions = {}): Promise<DocumentSearchResult[]> {
        const similarity = sql<number>`1 - (${cosineDistance(documents.embedding, queryVector)})`;

        const rows = await this.bounded(options, (tx) => tx
            .select({ ...documentColumns, similarity })
            .from(documents)
            .where(eq(documents.tenantId, tenantId))
            .orderBy(desc(similarity))
            .limit(limit));

        return rows.map((row, index) => ({
            document: toDocument(row),
            score: Number(row.similarity),
            rank: index + 1,
        }));
    }

    async sparseSearch(tenantId: string, query: string, limit: number, options: RetrievalOptions = {}): Promise<DocumentSearchResult[]> {
        const tsQuery = sql`plainto_tsquery('english', ${query})`;
        const rank = sql<number>`ts_rank_cd(${documents.tsvector}, ${tsQuery})`;

        const rows = await this.bounded(options, (tx) => tx
            .select({ ...documentColumns, rank })
            .from(documents)
            .where(
                and(
                    eq(documents.tenantId, tenantId),
                    sql`${documents.tsvector} @@ ${tsQuery}`
                )
            )
            .orderBy(desc(rank))
            .limit(limit));

        return rows.map((row, index) => ({
            document: toDocument(row),
            score: Number(row.rank),
            rank: index + 1,
        }));
    }

    async deleteByTenant(tenantId: string): Promise<number> {
        const deleted = await db
            .delete(documents)
            .where(eq(documents.tenantId, tenantId))
            .returning({ id: documents.id });

        return deleted.length;
    }

    async ping(): Promise<boolean> {
        try {
            await db.execute(sql`select 1`);
            return true;
        } catch (error) {
            logger.error('Database health check failed', {
                error: error instanceof Error ? error.message : String(error),
            });
            return false;
        }
    }

    /**
     * Runs a retrieval query in its own transaction with a local
     * statement_timeout, so Postgres cancels the statement itself once the
     * caller's deadline has passed.
     */
    private async bounded<T>(options: RetrievalOptions, query: (tx: DatabaseTransaction) => Promise<T>): Promise<T> {
        options.signal?.throwIfAborted();

        return db.transaction(async (tx) => {
            if (options.timeoutMs !== undefined) {
                const timeout = String(Math.max(1, Math.ceil(options.timeoutMs)));
                await tx.execute(sql`select set_config('statement_timeout', ${timeout}, true)`);
            }
            options.signal?.throwIfAborted();
            return query(tx);
        });
    }
}
