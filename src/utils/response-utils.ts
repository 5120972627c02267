import { Response } from 'express';
import { logger } from './logger';
import { AppError, ValidationError, getErrorMessage } from './errors';

export interface SuccessBody<T> {
    success: true;
    message: string;
    data?: T;
}

export interface ErrorBody {
    success: false;
    message: string;
    error: string;
    details?: string[];
}

export class ResponseUtils {
    public static handleSuccess<T>(res: Response, message: string, data: T | null = null, statusCode: number = 200): Response {
        const response: SuccessBody<T> = {
            success: true,
            message
        };

        if (data !== null) {
            response.data = data;
        }

        return res.status(statusCode).json(response);
    }

    public static handleError(
        res: Response,
        message: string,
        error: unknown,
        statusCode?: number
    ): Response {
        const status = statusCode ?? (error instanceof AppError ? error.statusCode : 500);

        if (status >= 500) {
            logger.error(`Controller error: ${message}`, error);
        } else {
            logger.warn(`Controller rejected request: ${message}`, { error: getErrorMessage(error), status });
        }

        const body: ErrorBody = {
            success: false,
            message,
            error: getErrorMessage(error)
        };

        if (error instanceof ValidationError && error.details.length > 0) {
            body.details = error.details;
        }

        return res.status(status).json(body);
    }
}
