import rateLimit from 'express-rate-limit';

/**
 * Rate limiter for indexing endpoints
 * Every request fans out into embedding calls, so limit to 10 requests per minute per IP address
 */
export const indexingRateLimiter = rateLimit({
    windowMs: 60 * 1000, // 1 minute
    limit: 10,
    message: { status: 'error', message: 'Too many indexing requests, try again later' },
    standardHeaders: true,
    legacyHeaders: false,
});
