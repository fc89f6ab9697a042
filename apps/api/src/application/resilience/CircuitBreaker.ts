import type { BreakerSnapshot, BreakerStateName } from '@hybrid-retrieval/types';
import { CircuitOpenError } from '../../domain/errors/CircuitOpenError';
import logger from '../../infrastructure/logger';
import { DeadlineExceededError } from './DeadlineGuard';

export interface CircuitBreakerOptions {
    /** Dependency name, used in errors, logs and health output. */
    name: string;
    /** Consecutive failures that open the breaker. */
    threshold?: number;
    /** Time spent open before a single trial call is admitted. */
    cooldownMs?: number;
    /** Clock override used by tests. */
    now?: () => number;
}

/**
 * Ticket returned by {@link CircuitBreaker.tryAcquire}. An admitted attempt
 * must be settled exactly once; later calls are ignored.
 */
export interface BreakerAttempt {
    readonly allowed: boolean;
    readonly state: BreakerStateName;
    readonly retryAt: number | null;
    succeed(): void;
    fail(): void;
    /** Frees a half-open trial slot without recording an outcome. */
    release(): void;
}

type AttemptOutcome = 'success' | 'failure' | 'release';

const DEFAULT_THRESHOLD = 3;
const DEFAULT_COOLDOWN_MS = 30_000;

function assertPositiveInteger(value: number, name: string): void {
    if (!Number.isInteger(value) || value <= 0) {
        throw new TypeError(`${name} must be a positive integer`);
    }
}

function assertNonNegative(value: number, name: string): void {
    if (!Number.isFinite(value) || value < 0) {
        throw new TypeError(`${name} must be a non-negative number`);
    }
}

const rejectedAttempt = (state: BreakerStateName, retryAt: number | null): BreakerAttempt => ({
    allowed: false,
    state,
    retryAt,
    succeed: () => {},
    fail: () => {},
    release: () => {},
});

/**
 * Closed → open → half-open state machine guarding one downstream
 * dependency. One instance is shared by every request hitting that
 * dependency.
 *
 * Admission and transitions run synchronously, so concurrent requests on the
 * event loop cannot interleave inside them. Each transition bumps a
 * generation counter and outcomes from attempts admitted under an older
 * generation are dropped: a burst of failures opens the breaker once, and a
 * late success from before the breaker opened cannot close it.
 */
export class CircuitBreaker {
    public readonly name: string;
    private readonly threshold: number;
    private readonly cooldownMs: number;
    private readonly now: () => number;

    private state: BreakerStateName = 'closed';
    private consecutiveFailures = 0;
    private lastTransitionAt: number | null = null;
    private trialInFlight = false;
    private generation = 0;

    constructor(options: CircuitBreakerOptions) {
        const threshold = options.threshold ?? DEFAULT_THRESHOLD;
        const cooldownMs = options.cooldownMs ?? DEFAULT_COOLDOWN_MS;
        assertPositiveInteger(threshold, 'threshold');
        assertNonNegative(cooldownMs, 'cooldownMs');

        this.name = options.name;
        this.threshold = threshold;
        this.cooldownMs = cooldownMs;
        this.now = options.now ?? (() => Date.now());
    }

    getState(): BreakerStateName {
        this.refresh(this.now());
        return this.state;
    }

    snapshot(): BreakerSnapshot {
        this.refresh(this.now());
        return {
            name: this.name,
            state: this.state,
            consecutiveFailures: this.consecutiveFailures,
            lastTransitionAt: this.lastTransitionAt,
            threshold: this.threshold,
            cooldownMs: this.cooldownMs,
            halfOpenTrialInFlight: this.trialInFlight,
        };
    }

    tryAcquire(): BreakerAttempt {
        this.refresh(this.now());

        if (this.state === 'open') {
            return rejectedAttempt('open', this.retryAt());
        }

        if (this.state === 'half-open') {
            if (this.trialInFlight) {
                return rejectedAttempt('half-open', null);
            }
            this.trialInFlight = true;
        }

        const origin = this.state;
        const generation = this.generation;
        let settled = false;

        const settle = (outcome: AttemptOutcome) => {
            if (settled) return;
            settled = true;
            this.complete(origin, generation, outcome);
        };

        return {
            allowed: true,
            state: origin,
            retryAt: null,
            succeed: () => settle('success'),
            fail: () => settle('failure'),
            release: () => settle('release'),
        };
    }

    /**
     * Runs `operation` under the breaker. Rejects with {@link CircuitOpenError}
     * without invoking it when no attempt is admitted. An abort on `signal`
     * settles the attempt immediately, so a call that ignores cancellation
     * cannot hold the half-open slot: a {@link DeadlineExceededError} reason
     * records a failure, any other reason is the caller giving up and only
     * releases the attempt.
     */
    async execute<T>(operation: () => Promise<T>, options: { signal?: AbortSignal } = {}): Promise<T> {
        const attempt = this.tryAcquire();
        if (!attempt.allowed) {
            throw new CircuitOpenError(this.name, attempt.retryAt);
        }

        const { signal } = options;
        const onAbort = () => {
            if (signal?.reason instanceof DeadlineExceededError) {
                attempt.fail();
            } else {
                attempt.release();
            }
        };
        if (signal?.aborted) {
            onAbort();
        } else {
            signal?.addEventListener('abort', onAbort, { once: true });
        }

        try {
            const result = await operation();
            attempt.succeed();
            return result;
        } catch (error) {
            attempt.fail();
            throw error;
        } finally {
            signal?.removeEventListener('abort', onAbort);
        }
    }

    private retryAt(): number | null {
        return this.lastTransitionAt === null ? null : this.lastTransitionAt + this.cooldownMs;
    }

    private refresh(now: number): void {
        if (this.state === 'open' && this.lastTransitionAt !== null && now - this.lastTransitionAt >= this.cooldownMs) {
            this.transition('half-open', now);
        }
    }

    private complete(origin: BreakerStateName, generation: number, outcome: AttemptOutcome): void {
        if (generation !== this.generation) {
            return;
        }

        if (origin === 'half-open') {
            this.trialInFlight = false;
        }

        if (outcome === 'release') {
            return;
        }

        if (outcome === 'success') {
            if (this.state === 'half-open') {
                this.transition('closed', this.now());
            } else {
                this.consecutiveFailures = 0;
            }
            return;
        }

        this.consecutiveFailures += 1;
        if (this.state === 'half-open' || this.consecutiveFailures >= this.threshold) {
            this.transition('open', this.now());
        }
    }

    private transition(next: BreakerStateName, at: number): void {
        const previous = this.state;
        this.state = next;
        this.lastTransitionAt = at;
        this.generation += 1;
        this.trialInFlight = false;

        if (next === 'closed') {
            this.consecutiveFailures = 0;
            logger.info('Circuit breaker closed', { dependency: this.name, previous });
        } else if (next === 'open') {
            logger.warn('Circuit breaker opened', {
                dependency: this.name,
                previous,
                consecutiveFailures: this.consecutiveFailures,
                retryAt: at + this.cooldownMs,
            });
        } else {
            logger.info('Circuit breaker half-open, admitting one trial call', { dependency: this.name });
        }
    }
}
