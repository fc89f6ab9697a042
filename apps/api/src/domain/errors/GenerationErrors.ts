import { AppError } from './AppError';

export class GenerationTimeoutError extends AppError {
    constructor(public readonly timeoutMs: number) {
        super(`Summary generation exceeded its ${timeoutMs}ms deadline`, 504, 'GENERATION_TIMEOUT');
    }
}

export class GenerationFailureError extends AppError {
    constructor(message: string) {
        super(`Summary generation failed: ${message}`, 502, 'GENERATION_FAILURE');
    }
}
