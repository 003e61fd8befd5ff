import { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger } from '../config/logger';
import { ErrorResponse } from '../types/api';

export interface AppError extends Error {
    statusCode?: number;
    status?: string;
    isOperational?: boolean;
}

export const errorHandler = (
    err: AppError,
    req: Request,
    res: Response,
    // four arguments mark this as Express error middleware
    _next: NextFunction
): void => {
    const statusCode = err.statusCode || 500;

    logger.log(statusCode >= 500 ? 'error' : 'warn', 'API error occurred', {
        message: err.message,
        stack: statusCode >= 500 ? err.stack : undefined,
        statusCode,
        status: err.status || 'error',
        path: req.path,
        method: req.method,
        query: req.query
    });

    const errorResponse: ErrorResponse = {
        success: false,
        error: err.name || 'Error',
        message: err.message || 'Internal Server Error',
        timestamp: new Date().toISOString(),
        path: req.originalUrl,
        method: req.method
    };

    if (process.env.NODE_ENV === 'development') {
        errorResponse.stack = err.stack;
    }

    res.status(statusCode).json(errorResponse);
};

export class ValidationError extends Error {
    statusCode = 400;
    status = 'fail';
    isOperational = true;

    constructor(message: string) {
        super(message);
        this.name = 'ValidationError';
    }
}

export class NotFoundError extends Error {
    statusCode = 404;
    status = 'fail';
    isOperational = true;

    constructor(message: string) {
        super(message);
        this.name = 'NotFoundError';
    }
}

/**
 * The input batch is structurally unusable: unreadable source or missing
 * required columns. Raised before any enrichment runs.
 */
export class IngestionError extends Error {
    statusCode = 422;
    status = 'fail';
    isOperational = true;

    constructor(message: string, readonly missingColumns: string[] = []) {
        super(message);
        this.name = 'IngestionError';
    }
}

export class SnapshotUnavailableError extends Error {
    statusCode = 503;
    status = 'error';
    isOperational = true;

    constructor(message: string = 'No scored transaction batch is loaded') {
        super(message);
        this.name = 'SnapshotUnavailableError';
    }
}

export const asyncHandler = (
    fn: (req: Request, res: Response, next: NextFunction) => Promise<void> | void
): RequestHandler => {
    return (req, res, next) => {
        Promise.resolve(fn(req, res, next)).catch(next);
    };
};
