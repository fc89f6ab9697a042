import type { Response } from 'express';

/**
 * Aborts when the client goes away before the response has been fully
 * written, so in-flight retrieval and generation calls are cancelled.
 */
export function requestSignal(res: Response): AbortSignal {
    const abortController = new AbortController();

    res.once('close', () => {
        if (!res.writableFinished) {
            abortController.abort(new Error('Client disconnected'));
        }
    });

    return abortController.signal;
}
