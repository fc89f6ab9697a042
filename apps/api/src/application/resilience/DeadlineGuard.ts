export class DeadlineExceededError extends Error {
    constructor(public readonly timeoutMs: number) {
        super(`Deadline of ${timeoutMs}ms exceeded`);
        this.name = 'DeadlineExceededError';
    }
}

export interface BoundedOperation<T, N extends string = string> {
    name: N;
    /**
     * Must pass `signal` down to the underlying I/O so a timeout cancels it.
     * `remainingMs` reports what is left of the sub-deadline at call time.
     */
    run: (signal: AbortSignal, remainingMs: () => number) => Promise<T>;
    /** Sub-deadline, capped at the overall budget. */
    timeoutMs?: number;
}

export type BoundedOutcome<T, N extends string = string> =
    | { name: N; status: 'fulfilled'; value: T; elapsedMs: number }
    | { name: N; status: 'rejected'; reason: unknown; elapsedMs: number }
    | { name: N; status: 'timeout'; timeoutMs: number; elapsedMs: number }
    | { name: N; status: 'cancelled'; elapsedMs: number };

export interface BoundedRun<T, N extends string = string> {
    /** One outcome per operation, in input order. */
    outcomes: BoundedOutcome<T, N>[];
    /** False when nothing fulfilled: every operation failed, timed out or was cancelled. */
    usable: boolean;
    elapsedMs: number;
}

export interface RunBoundedOptions {
    budgetMs: number;
    /** Caller cancellation, e.g. a client disconnect. */
    signal?: AbortSignal;
}

/**
 * A time budget with its own AbortSignal. The signal aborts with a
 * {@link DeadlineExceededError} when the budget runs out, or with the
 * parent's reason when the parent signal aborts first.
 */
export class Deadline {
    private readonly controller = new AbortController();
    private readonly timer: ReturnType<typeof setTimeout>;
    private readonly startedAt: number;
    private timedOut = false;
    private readonly onParentAbort = () => {
        clearTimeout(this.timer);
        this.controller.abort(this.parent?.reason);
    };

    constructor(
        public readonly budgetMs: number,
        private readonly parent?: AbortSignal,
        private readonly now: () => number = () => Date.now()
    ) {
        this.startedAt = this.now();
        this.timer = setTimeout(() => {
            this.timedOut = true;
            this.controller.abort(new DeadlineExceededError(budgetMs));
        }, budgetMs);

        if (parent?.aborted) {
            this.onParentAbort();
        } else {
            parent?.addEventListener('abort', this.onParentAbort, { once: true });
        }
    }

    get signal(): AbortSignal {
        return this.controller.signal;
    }

    /** True once the budget ran out (as opposed to a parent cancellation). */
    get expired(): boolean {
        return this.timedOut;
    }

    elapsedMs(): number {
        return this.now() - this.startedAt;
    }

    remainingMs(): number {
        return Math.max(0, this.budgetMs - this.elapsedMs());
    }

    dispose(): void {
        clearTimeout(this.timer);
        this.parent?.removeEventListener('abort', this.onParentAbort);
    }
}

/**
 * Resolves with the value of `pending`, or with `undefined` as soon as
 * `signal` aborts. A rejection of `pending` after the abort is absorbed.
 */
export function untilAborted<T>(pending: Promise<T>, signal: AbortSignal): Promise<T | undefined> {
    return new Promise<T | undefined>((resolve, reject) => {
        const onAbort = () => resolve(undefined);
        signal.addEventListener('abort', onAbort, { once: true });

        void pending.then(
            (value) => {
                signal.removeEventListener('abort', onAbort);
                resolve(value);
            },
            (error: unknown) => {
                signal.removeEventListener('abort', onAbort);
                reject(error);
            }
        );

        if (signal.aborted) {
            onAbort();
        }
    });
}

function assertBudget(budgetMs: number): void {
    if (!Number.isFinite(budgetMs) || budgetMs <= 0) {
        throw new RangeError(`Deadline budget must be a positive number of milliseconds, received ${budgetMs}`);
    }
}

/**
 * Runs independent operations concurrently under a time budget and reports
 * what each one produced. Timeouts and failures are outcomes, never
 * rejections; deciding whether "nothing usable" is fatal is left to the caller.
 */
export class DeadlineGuard {
    constructor(private readonly now: () => number = () => Date.now()) {}

    deadline(budgetMs: number, signal?: AbortSignal): Deadline {
        assertBudget(budgetMs);
        return new Deadline(budgetMs, signal, this.now);
    }

    async runBounded<T, N extends string = string>(
        operations: readonly BoundedOperation<T, N>[],
        options: RunBoundedOptions
    ): Promise<BoundedRun<T, N>> {
        assertBudget(options.budgetMs);
        const startedAt = this.now();

        const outcomes = await Promise.all(operations.map((operation) => this.runOne(operation, options)));

        return {
            outcomes,
            usable: outcomes.some((outcome) => outcome.status === 'fulfilled'),
            elapsedMs: this.now() - startedAt,
        };
    }

    private runOne<T, N extends string>(
        operation: BoundedOperation<T, N>,
        options: RunBoundedOptions
    ): Promise<BoundedOutcome<T, N>> {
        const { name } = operation;
        const timeoutMs = Math.min(operation.timeoutMs ?? options.budgetMs, options.budgetMs);
        const deadline = this.deadline(timeoutMs, options.signal);

        return new Promise<BoundedOutcome<T, N>>((resolve) => {
            const finish = (outcome: BoundedOutcome<T, N>) => {
                deadline.signal.removeEventListener('abort', onAbort);
                deadline.dispose();
                resolve(outcome);
            };

            // Registered before the operation starts so it fires ahead of the operation's own abort handling.
            const onAbort = () => {
                const elapsedMs = deadline.elapsedMs();
                finish(
                    deadline.expired
                        ? { name, status: 'timeout', timeoutMs, elapsedMs }
                        : { name, status: 'cancelled', elapsedMs }
                );
            };

            if (deadline.signal.aborted) {
                onAbort();
                return;
            }
            deadline.signal.addEventListener('abort', onAbort, { once: true });

            let pending: Promise<T>;
            try {
                pending = operation.run(deadline.signal, () => deadline.remainingMs());
            } catch (error) {
                pending = Promise.reject(error);
            }

            void pending.then(
                (value) => finish({ name, status: 'fulfilled', value, elapsedMs: deadline.elapsedMs() }),
                (reason: unknown) => finish({ name, status: 'rejected', reason, elapsedMs: deadline.elapsedMs() })
            );
        });
    }
}
