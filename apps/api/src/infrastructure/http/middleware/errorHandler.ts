import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { AppError } from '../../../domain/errors/AppError';
import logger from '../../logger';

export const errorHandler = (
    err: Error,
    req: Request,
    res: Response,
    _next: NextFunction
) => {
    if (err instanceof ZodError) {
        return res.status(400).json({
            status: 'fail',
            message: 'Validation Error',
            errors: err.issues,
        });
    }

    if (err instanceof AppError) {
        const log = err.statusCode >= 500 ? logger.error.bind(logger) : logger.warn.bind(logger);
        log(err.message, { path: req.path, statusCode: err.statusCode, ...err.details });

        return res.status(err.statusCode).json({
            status: 'error',
            message: err.message,
            ...(err.details ? { details: err.details } : {}),
        });
    }

    logger.error(err);

    // Fallback for unhandled errors
    return res.status(500).json({
        status: 'error',
        message: 'Internal Server Error',
    });
};
