import type { Request, Response, NextFunction } from 'express';
import type { ZodType } from 'zod';

/**
 * Validates the request body and replaces it with the parsed value, so
 * handlers see trimmed strings and applied defaults.
 */
export const validateRequest = (schema: ZodType) => {
    return async (req: Request, res: Response, next: NextFunction) => {
        try {
            req.body = await schema.parseAsync(req.body);
            next();
        } catch (error) {
            next(error);
        }
    };
};
