import type { Request, Response, NextFunction } from 'express';
import { AppError } from '../../../domain/errors/AppError';
import { ZodError } from 'zod';
import logger from '../../logger';

export const errorHandler = (
    err: Error,
    req: Request,
    res: Response,
    _next: NextFunction
): void => {
    if (err instanceof ZodError) {
        logger.warn('Request validation failed', { path: req.path, issues: err.issues.length });
        res.status(400).json({
            status: 'fail',
            message: 'Validation Error',
            errors: err.issues,
        });
        return;
    }

    if (err instanceof AppError) {
        if (err.statusCode >= 500) {
            logger.error(err.message, { path: req.path, code: err.code });
        } else {
            logger.warn(err.message, { path: req.path, code: err.code });
        }
        res.status(err.statusCode).json({
            status: 'error',
            code: err.code,
            message: err.message,
        });
        return;
    }

    logger.error(err);

    // Fallback for unhandled errors
    res.status(500).json({
        status: 'error',
        code: 'INTERNAL_ERROR',
        message: 'Internal Server Error',
    });
};
