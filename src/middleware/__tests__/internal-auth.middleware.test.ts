import express, { Express } from 'express';
import { startTestServer, TestServer } from '@/test-utils/http';
import { JWTUtils } from '@/utils/jwt-utils';
import { createInternalAuth } from '../internal-auth.middleware';

const buildApp = (secret: string, issuer?: string): Express => {
    const app = express();
    app.get('/internal', createInternalAuth({ secret, issuer }), (_req, res) => {
        res.json({ success: true });
    });
    return app;
};

describe('createInternalAuth', () => {
    describe('with a secret', () => {
        let server: TestServer;

        beforeAll(async () => {
            server = await startTestServer(buildApp('test-secret', 'scheduler'));
        });

        afterAll(async () => {
            await server.close();
        });

        const call = (token?: string) =>
            server.client.get('/internal', token ? { headers: { Authorization: `Bearer ${token}` } } : {});

        it('requires a token', async () => {
            const response = await call();

            expect(response.status).toBe(401);
            expect(response.data).toEqual({ success: false, message: 'Internal API authentication required' });
        });

        it('accepts a token signed with the secret and issuer', async () => {
            const response = await call(JWTUtils.signInternalToken('test-secret', 'scheduler', 'tests'));

            expect(response.status).toBe(200);
        });

        it('rejects other secrets and issuers', async () => {
            const wrongSecret = await call(JWTUtils.signInternalToken('other-secret', 'scheduler', 'tests'));
            const wrongIssuer = await call(JWTUtils.signInternalToken('test-secret', 'someone-else', 'tests'));

            expect(wrongSecret.data).toEqual({ success: false, message: 'Internal API authentication failed' });
            expect(wrongIssuer.status).toBe(401);
        });

        it('rejects expired tokens', async () => {
            const response = await call(JWTUtils.signInternalToken('test-secret', 'scheduler', 'tests', -60));

            expect(response.status).toBe(401);
            expect(response.data).toEqual({ success: false, message: 'Token expired' });
        });
    });

    it('lets requests through when no secret is configured', async () => {
        const server = await startTestServer(buildApp(''));
        try {
            const response = await server.client.get('/internal');
            expect(response.status).toBe(200);
        } finally {
            await server.close();
        }
    });
});
