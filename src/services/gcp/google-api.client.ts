import axios, { AxiosInstance } from 'axios';
import { GoogleAuth } from 'google-auth-library';
import { logger } from '@/utils';

export interface AccessTokenProvider {
    getAccessToken(): Promise<string | null | undefined>;
}

export type HttpPoster = Pick<AxiosInstance, 'post'>;

const CLOUD_PLATFORM_SCOPE = 'https://www.googleapis.com/auth/cloud-platform';

/**
 * Thin authenticated JSON client for Google REST APIs.
 */
export class GoogleApiClient {
    constructor(
        private readonly auth: AccessTokenProvider = new GoogleAuth({ scopes: [CLOUD_PLATFORM_SCOPE] }),
        private readonly http: HttpPoster = axios.create({ timeout: 15000 })
    ) {}

    async post<T>(url: string, body: unknown): Promise<T> {
        const token = await this.auth.getAccessToken();
        if (!token) {
            throw new Error('Could not obtain a Google access token');
        }

        try {
            const response = await this.http.post<T>(url, body, {
                headers: {
                    Authorization: `Bearer ${token}`,
                    'Content-Type': 'application/json'
                }
            });
            return response.data;
        } catch (error) {
            if (axios.isAxiosError(error)) {
                const detail = error.response ? `${error.response.status}: ${JSON.stringify(error.response.data)}` : error.message;
                logger.error(`Google API call failed: ${url}`, undefined, { detail });
                throw new Error(`Google API ${url} failed with ${detail}`);
            }
            throw error;
        }
    }
}
