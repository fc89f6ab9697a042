import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { CircuitBreaker } from '../src/application/resilience/CircuitBreaker';

describe('CircuitBreaker properties', () => {
    it('should open exactly when threshold consecutive failures occur and then stop calling the dependency', async () => {
        await fc.assert(
            fc.asyncProperty(fc.array(fc.boolean(), { maxLength: 40 }), fc.integer({ min: 1, max: 5 }), async (outcomes, threshold) => {
                const breaker = new CircuitBreaker({ name: 'dep', threshold, cooldownMs: 60_000, now: () => 0 });

                let expectedFailures = 0;
                let expectedOpen = false;
                let expectedCalls = 0;
                let calls = 0;

                for (const succeeds of outcomes) {
                    const operation = () => {
                        calls += 1;
                        return succeeds ? Promise.resolve(true) : Promise.reject(new Error('down'));
                    };
                    await breaker.execute(operation).catch(() => false);

                    if (expectedOpen) continue;
                    expectedCalls += 1;
                    expectedFailures = succeeds ? 0 : expectedFailures + 1;
                    expectedOpen = expectedFailures >= threshold;
                }

                expect(calls).toBe(expectedCalls);
                expect(breaker.getState()).toBe(expectedOpen ? 'open' : 'closed');
            })
        );
    });
});
