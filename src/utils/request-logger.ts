import { Request } from 'express';
import { logger } from './logger';

const MASKED_FIELDS = ['password', 'accessToken', 'authorization', 'signedUrl', 'smtpPassword'];

export class RequestLogger {
    logRequest(operation: string, req: Request): void {
        logger.info(`Controller operation: ${operation}`, {
            method: req.method,
            path: req.path,
            params: req.params,
            query: req.query,
            traceId: req.traceId,
            body: this.sanitizeRequestBody(req.body)
        });
    }

    private sanitizeRequestBody(body: unknown): unknown {
        if (typeof body !== 'object' || body === null || Array.isArray(body)) {
            return body;
        }

        const sanitized: Record<string, unknown> = { ...body };
        for (const field of MASKED_FIELDS) {
            if (sanitized[field]) sanitized[field] = '***';
        }
        return sanitized;
    }
}
