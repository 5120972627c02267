import { Request, Response, NextFunction, RequestHandler } from 'express';
import { InternalAuthConfig } from '@/config/auth.config';
import { JWTUtils } from '@/utils/jwt-utils';
import { logger } from '@/utils';

const passThrough: RequestHandler = (_req, _res, next) => next();

export const createInternalAuth = (config: InternalAuthConfig): RequestHandler => {
    if (!config.secret) {
        logger.warn('INTERNAL_JWT_SECRET is not set, internal endpoints are unauthenticated');
        return passThrough;
    }

    return (req: Request, res: Response, next: NextFunction) => {
        try {
            const authHeader = req.headers.authorization;
            const token = authHeader?.replace('Bearer ', '');

            if (!token) {
                logger.warn('Missing internal API token', {
                    ip: req.ip,
                    path: req.path,
                    traceId: req.traceId
                });
                return res.status(401).json({
                    success: false,
                    message: 'Internal API authentication required'
                });
            }

            const payload = JWTUtils.verifyInternalToken(token, config.secret, config.issuer);

            if (JWTUtils.isTokenExpired(payload)) {
                return res.status(401).json({
                    success: false,
                    message: 'Token expired'
                });
            }

            logger.debug('Internal JWT authentication successful', {
                issuer: payload.iss,
                subject: payload.sub,
                path: req.path
            });

            next();
        } catch (error) {
            logger.warn('Internal JWT authentication failed', {
                path: req.path,
                traceId: req.traceId,
                error: error instanceof Error ? error.message : String(error)
            });
            return res.status(401).json({
                success: false,
                message: 'Internal API authentication failed'
            });
        }
    };
};
