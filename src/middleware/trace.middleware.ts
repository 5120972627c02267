import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';

const TRACE_HEADER = 'x-cloud-trace-context';

// Header format: TRACE_ID/SPAN_ID;o=OPTIONS
export const traceIdFromHeader = (header: string | undefined): string | null => {
    if (!header) {
        return null;
    }
    const traceId = header.split('/')[0].trim();
    return traceId || null;
};

export const attachTraceId = (req: Request, res: Response, next: NextFunction): void => {
    req.traceId = traceIdFromHeader(req.header(TRACE_HEADER)) ?? uuidv4();
    res.setHeader('X-Trace-Id', req.traceId);
    next();
};
