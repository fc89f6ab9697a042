import { z } from 'zod';

const tenantId = z.string().trim().min(1, 'tenantId cannot be empty').max(128);

export const searchRequestSchema = z.object({
  tenantId,
  query: z.string().trim().min(1, 'Query cannot be empty').max(2000),
  topK: z.number().int().min(1).max(100).default(5),
});

export const ingestDocumentSchema = z.object({
  tenantId,
  documentId: z.string().trim().min(1, 'documentId cannot be empty').max(256),
  content: z.string().min(1, 'Document content cannot be empty'),
  metadata: z.record(z.unknown()).default({}),
});

export const tenantParamsSchema = z.object({
  tenantId,
});

export type SearchRequest = z.infer<typeof searchRequestSchema>;
export type IngestDocumentRequest = z.infer<typeof ingestDocumentSchema>;
