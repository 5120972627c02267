import jwt, { JwtPayload } from 'jsonwebtoken';
import { logger } from './logger';

export interface JWTInternalPayload {
    iss?: string;
    aud?: string | string[];
    sub?: string;
    iat?: number;
    exp?: number;
}

export class JWTUtils {
    static verifyInternalToken(token: string, secret: string, expectedIssuer?: string): JWTInternalPayload {
        try {
            const decoded = jwt.verify(token, secret, {
                algorithms: ['HS256'],
                issuer: expectedIssuer,
                ignoreExpiration: true
            });

            if (typeof decoded === 'string') {
                throw new Error('Unexpected string payload');
            }

            logger.debug('JWT token verified successfully', {
                issuer: decoded.iss,
                subject: decoded.sub
            });

            return JWTUtils.toPayload(decoded);

        } catch (error) {
            logger.warn('JWT token verification failed', { error: error instanceof Error ? error.message : String(error) });
            throw new Error('Invalid internal API token');
        }
    }

    static isTokenExpired(payload: JWTInternalPayload, now: number = Date.now()): boolean {
        if (payload.exp === undefined) {
            return false;
        }
        const isExpired = now >= payload.exp * 1000;
        if (isExpired) {
            logger.warn('JWT token expired', {
                issuer: payload.iss,
                subject: payload.sub,
                expiredAt: new Date(payload.exp * 1000).toISOString()
            });
        }
        return isExpired;
    }

    static signInternalToken(secret: string, issuer: string, subject: string, expiresInSeconds: number = 300): string {
        return jwt.sign({ sub: subject }, secret, { algorithm: 'HS256', issuer, expiresIn: expiresInSeconds });
    }

    private static toPayload(decoded: JwtPayload): JWTInternalPayload {
        return {
            iss: decoded.iss,
            aud: decoded.aud,
            sub: decoded.sub,
            iat: decoded.iat,
            exp: decoded.exp
        };
    }
}
