import rateLimit from 'express-rate-limit';

/**
 * Rate limiter for the summary endpoints
 * Generation is the expensive stage, so it gets a tighter budget than plain search
 */
export const summaryRateLimiter = rateLimit({
    windowMs: 60 * 1000, // 1 minute
    limit: 30, // 30 requests per minute
    message: { status: 'error', code: 'RATE_LIMITED', message: 'Too many summary requests, try again later' },
    standardHeaders: true,
    legacyHeaders: false,
});
