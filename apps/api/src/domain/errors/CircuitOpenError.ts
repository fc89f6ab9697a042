import { AppError } from './AppError';

/**
 * Raised without attempting the call when a dependency's breaker is open,
 * or half-open with its single trial already in flight.
 */
export class CircuitOpenError extends AppError {
    constructor(
        public readonly dependency: string,
        public readonly retryAt: number | null
    ) {
        super(`Circuit breaker open for '${dependency}'`, 503, 'CIRCUIT_OPEN');
    }
}
