export * from './schemas';

export type RetrievalSource = 'dense' | 'sparse';

/**
 * A chat turn sent to the generative backend
 */
export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * One fused hit with its content attached after fusion
 */
export interface SearchHit {
  documentId: string;
  content: string;
  score: number;
  sources: RetrievalSource[];
  metadata: Record<string, unknown>;
}

export interface SearchResponse {
  results: SearchHit[];
  latencyMs: number;
  degradedSources: RetrievalSource[]; // Branches that contributed nothing (failed, timed out or short-circuited)
}

export type SummaryStatus = 'complete' | 'incomplete' | 'degraded' | 'skipped';

export type SummaryDegradedReason = 'circuit_open' | 'timeout' | 'provider_error' | 'cancelled';

export interface SummaryResponse extends SearchResponse {
  summary: string | null;
  summaryStatus: SummaryStatus;
  degradedReason?: SummaryDegradedReason;
  searchLatencyMs: number;
  llmLatencyMs: number;
}

/**
 * Events emitted by the streaming summary endpoint
 */
export type SummaryStreamEvent =
  | { type: 'meta'; results: SearchHit[]; searchLatencyMs: number; degradedSources: RetrievalSource[] }
  | { type: 'token'; content: string }
  | {
      type: 'done';
      summaryStatus: SummaryStatus;
      degradedReason?: SummaryDegradedReason;
      searchLatencyMs: number;
      llmLatencyMs: number;
    };

export interface IngestDocumentResponse {
  status: 'success';
  tenantId: string;
  documentId: string;
  latencyMs: number;
}

export interface DeleteTenantResponse {
  status: 'success';
  tenantId: string;
  deletedCount: number;
}

export type BreakerStateName = 'closed' | 'open' | 'half-open';

export interface BreakerSnapshot {
  name: string;
  state: BreakerStateName;
  consecutiveFailures: number;
  lastTransitionAt: number | null;
  threshold: number;
  cooldownMs: number;
  halfOpenTrialInFlight: boolean;
}

export interface HealthResponse {
  status: 'healthy' | 'degraded';
  database: boolean;
  breakers: BreakerSnapshot[];
}
