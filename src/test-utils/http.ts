import { Server } from 'http';
import { Express } from 'express';
import axios, { AxiosInstance } from 'axios';

export interface TestServer {
    client: AxiosInstance;
    close(): Promise<void>;
}

/**
 * Starts the app on an ephemeral local port. The client never throws on HTTP status codes.
 */
export const startTestServer = (app: Express): Promise<TestServer> =>
    new Promise((resolve, reject) => {
        const server: Server = app.listen(0, '127.0.0.1', () => {
            const address = server.address();
            if (!address || typeof address === 'string') {
                reject(new Error('Test server has no TCP address'));
                return;
            }

            resolve({
                client: axios.create({ baseURL: `http://127.0.0.1:${address.port}`, validateStatus: () => true }),
                close: () => new Promise<void>((done, fail) => {
                    server.close(error => (error ? fail(error) : done()));
                })
            });
        });
        server.on('error', reject);
    });
