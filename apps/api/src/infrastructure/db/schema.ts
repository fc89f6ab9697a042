import { SQL, sql } from 'drizzle-orm';
import { pgTable, uuid, text, timestamp, vector, jsonb, index, uniqueIndex, customType } from "drizzle-orm/pg-core";

// Custom type for PostgreSQL tsvector (full-text search)
const tsvector = customType<{ data: string }>({
    dataType() {
        return 'tsvector';
    },
});

export const EMBEDDING_DIMENSIONS = 768;

export const documents = pgTable("documents", {
    id: uuid("id").primaryKey().defaultRandom(),
    tenantId: text("tenant_id").notNull(),
    documentId: text("document_id").notNull(),
    content: text("content").notNull(),
    metadata: jsonb("metadata").$type<Record<string, unknown>>().notNull().default({}),
    embedding: vector("embedding", { dimensions: EMBEDDING_DIMENSIONS }).notNull(),
    tsvector: tsvector("tsvector").notNull().generatedAlwaysAs((): SQL => sql`to_tsvector('english', ${documents.content})`),
    createdAt: timestamp("created_at").defaultNow().notNull(),
    updatedAt: timestamp("updated_at").defaultNow().notNull(),
}, (table) => ([
    uniqueIndex("idx_documents_tenant_document").on(table.tenantId, table.documentId),
    index("idx_documents_tenant").on(table.tenantId),
    index("idx_documents_tsvector").using('gin', table.tsvector),
    index("idx_documents_embedding").using('hnsw', table.embedding.op('vector_cosine_ops')),
]));
