import type { SummaryStreamEvent } from '@hybrid-retrieval/types';
import { GenerationFailureError, GenerationTimeoutError } from '../../../domain/errors/GenerationErrors';
import logger from '../../../infrastructure/logger';
import type { LLMProvider } from '../../providers/LLMProvider';
import { CircuitBreaker } from '../../resilience/CircuitBreaker';
import { DeadlineGuard, untilAborted } from '../../resilience/DeadlineGuard';
import { SearchOrchestrator } from '../../services/SearchOrchestrator';
import { PromptBuilder } from './PromptBuilder';
import { SummaryContext, type GenerationOutcome } from './SummaryContext';

export interface SummaryPipelineConfig {
    /** Budget for the generation stage, independent of the search budget. */
    llmTimeoutMs: number;
    /** Results fed into the prompt, independent of topK. */
    contextSize: number;
}

export class SummaryPipeline {
    private config: SummaryPipelineConfig;

    constructor(
        private orchestrator: SearchOrchestrator,
        private llm: LLMProvider,
        private llmBreaker: CircuitBreaker,
        private deadlineGuard: DeadlineGuard,
        private promptBuilder: PromptBuilder,
        config?: Partial<SummaryPipelineConfig>
    ) {
        this.config = {
            llmTimeoutMs: config?.llmTimeoutMs ?? 2000,
            contextSize: config?.contextSize ?? 5,
        };
    }

    private async retrieve(ctx: SummaryContext) {
        const response = await this.orchestrator.search(ctx.request, { signal: ctx.signal });

        ctx.results = response.results;
        ctx.degradedSources = response.degradedSources;
        ctx.searchLatencyMs = response.latencyMs;
    }

    private buildContext(ctx: SummaryContext) {
        ctx.builtContext = ctx.results
            .slice(0, this.config.contextSize)
            .map((hit, i) => `[${i + 1}] ${hit.content}`)
            .join('\n\n');
    }

    async execute(ctx: SummaryContext): Promise<void> {
        const events = this.executeStream(ctx);
        let next = await events.next();
        while (!next.done) {
            next = await events.next();
        }
    }

    async *executeStream(ctx: SummaryContext): AsyncGenerator<SummaryStreamEvent> {
        await this.retrieve(ctx);

        yield {
            type: 'meta',
            results: ctx.results,
            searchLatencyMs: ctx.searchLatencyMs,
            degradedSources: ctx.degradedSources,
        };

        if (ctx.results.length) {
            this.buildContext(ctx);
            ctx.messages = this.promptBuilder.build(ctx.request.query, ctx.builtContext);
            yield* this.generate(ctx);
        }

        yield {
            type: 'done',
            summaryStatus: ctx.summaryStatus,
            degradedReason: ctx.degradedReason,
            searchLatencyMs: ctx.searchLatencyMs,
            llmLatencyMs: ctx.llmLatencyMs,
        };
    }

    private async *generate(ctx: SummaryContext): AsyncGenerator<SummaryStreamEvent> {
        const attempt = this.llmBreaker.tryAcquire();
        if (!attempt.allowed) {
            logger.warn('Summary skipped, generative backend breaker is open', {
                tenantId: ctx.request.tenantId,
                retryAt: attempt.retryAt,
            });
            ctx.degrade('circuit_open');
            return;
        }

        const deadline = this.deadlineGuard.deadline(this.config.llmTimeoutMs, ctx.signal);
        const stream = this.llm.generateStream(ctx.messages, deadline.signal)[Symbol.asyncIterator]();
        let outcome: GenerationOutcome | undefined;
        let produced = false;

        try {
            for (;;) {
                const next = await untilAborted(stream.next(), deadline.signal);
                if (next === undefined) {
                    outcome = deadline.expired ? 'timeout' : 'cancelled';
                    break;
                }
                if (next.done) {
                    outcome = 'complete';
                    break;
                }
                if (!next.value) continue;

                produced = true;
                ctx.summary += next.value;
                yield { type: 'token', content: next.value };
            }
        } catch (error) {
            if (deadline.signal.aborted) {
                outcome = deadline.expired ? 'timeout' : 'cancelled';
            } else {
                outcome = 'provider_error';
                const failure = new GenerationFailureError(error instanceof Error ? error.message : String(error));
                logger.warn(failure.message, { tenantId: ctx.request.tenantId, code: failure.code });
            }
        } finally {
            deadline.dispose();
            ctx.llmLatencyMs = deadline.elapsedMs();

            // An undefined outcome means our own consumer stopped iterating
            if (outcome !== 'complete') {
                closeStream(stream);
            }

            if (outcome === 'complete') {
                attempt.succeed();
            } else if (outcome === 'timeout' || outcome === 'provider_error') {
                attempt.fail();
            } else {
                attempt.release();
            }

            ctx.finishGeneration(outcome ?? 'cancelled', produced);

            if (outcome === 'timeout') {
                const timeout = new GenerationTimeoutError(this.config.llmTimeoutMs);
                logger.warn(timeout.message, { tenantId: ctx.request.tenantId, code: timeout.code, produced });
            }
        }
    }
}

function closeStream(stream: AsyncIterator<string>): void {
    const closing = stream.return?.();
    if (!closing) return;
    void closing.then(undefined, (error: unknown) => {
        logger.debug('Generation stream closed with an error', {
            error: error instanceof Error ? error.message : String(error),
        });
    });
}
