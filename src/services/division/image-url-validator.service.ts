import axios, { AxiosInstance } from 'axios';
import { ShipmentRecord, UrlValidationResult, ValidationStats } from '@/models/shipment';
import { isRecord, logger, mapWithConcurrency, roundTo } from '@/utils';

export type HttpHeadClient = Pick<AxiosInstance, 'head'>;

export interface ImageUrlValidatorOptions {
    timeoutMs: number;
    concurrency: number;
}

const URL_FIELDS = [
    'imageUrl', 'image_url', 'imagen_url', 'url_imagen', 'imagen',
    'image', 'photo_url', 'picture_url', 'img_url'
];

const NESTED_OBJECTS = ['product', 'producto'];

const IMAGE_CONTENT_TYPES = [
    'image/jpeg', 'image/jpg', 'image/png', 'image/gif',
    'image/webp', 'image/bmp', 'image/tiff', 'image/svg+xml'
];

const USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

export const ERROR_MISSING_URL = 'Missing or empty URL';
export const ERROR_INVALID_FORMAT = 'Invalid URL format';
export const ERROR_CONNECTION = 'Connection error - URL not reachable';

const CONNECTION_CODES = ['ECONNREFUSED', 'ENOTFOUND', 'ECONNRESET', 'EAI_AGAIN', 'EHOSTUNREACH'];
const TIMEOUT_CODES = ['ECONNABORTED', 'ETIMEDOUT'];

const headerString = (value: unknown): string | null => {
    if (typeof value === 'string') return value;
    if (typeof value === 'number') return String(value);
    if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
    return null;
};

const pickUrl = (source: Record<string, unknown>): string | null => {
    for (const field of URL_FIELDS) {
        const value = source[field];
        if (typeof value === 'string' && value.trim()) {
            return value.trim();
        }
    }
    return null;
};

export const extractImageUrl = (shipment: ShipmentRecord): string | null => {
    const direct = pickUrl(shipment);
    if (direct) {
        return direct;
    }

    for (const key of NESTED_OBJECTS) {
        const nested = shipment[key];
        if (isRecord(nested)) {
            const url = pickUrl(nested);
            if (url) return url;
        }
    }
    return null;
};

export const hasValidUrlFormat = (url: string): boolean => {
    try {
        const parsed = new URL(url);
        return (parsed.protocol === 'http:' || parsed.protocol === 'https:') && parsed.host.length > 0;
    } catch {
        return false;
    }
};

export class ImageUrlValidatorService {
    constructor(
        private readonly options: ImageUrlValidatorOptions,
        private readonly http: HttpHeadClient = axios.create()
    ) {}

    async validateUrl(url: string | null): Promise<UrlValidationResult> {
        const base: UrlValidationResult = {
            url,
            valid: false,
            error: null,
            statusCode: null,
            contentType: null,
            contentLength: null
        };

        if (!url || !url.trim()) {
            return { ...base, error: ERROR_MISSING_URL };
        }
        if (!hasValidUrlFormat(url)) {
            return { ...base, error: ERROR_INVALID_FORMAT };
        }

        try {
            const response = await this.http.head(url, {
                timeout: this.options.timeoutMs,
                maxRedirects: 5,
                headers: { 'User-Agent': USER_AGENT },
                validateStatus: () => true
            });

            const contentType = headerString(response.headers['content-type'])?.toLowerCase() ?? null;
            const lengthHeader = headerString(response.headers['content-length']);
            const contentLength = lengthHeader !== null && /^\d+$/.test(lengthHeader) ? parseInt(lengthHeader, 10) : null;
            const result: UrlValidationResult = { ...base, statusCode: response.status, contentType, contentLength };

            if (response.status !== 200) {
                return { ...result, error: `Invalid status code: ${response.status}` };
            }
            if (!contentType || !IMAGE_CONTENT_TYPES.some(type => contentType.includes(type))) {
                return { ...result, error: `Content type is not an image: ${contentType ?? 'unknown'}` };
            }

            return { ...result, valid: true };
        } catch (error) {
            return { ...base, error: this.describeRequestError(error) };
        }
    }

    private describeRequestError(error: unknown): string {
        if (axios.isAxiosError(error)) {
            if (error.code && TIMEOUT_CODES.includes(error.code)) {
                return `Timeout after ${this.options.timeoutMs / 1000} seconds`;
            }
            if (error.code && CONNECTION_CODES.includes(error.code)) {
                return ERROR_CONNECTION;
            }
            return `Request error: ${error.message}`;
        }
        return `Unexpected error: ${error instanceof Error ? error.message : String(error)}`;
    }

    async validateShipments(shipments: ShipmentRecord[]): Promise<UrlValidationResult[]> {
        logger.info(`Validating image URLs of ${shipments.length} shipments`, { concurrency: this.options.concurrency });

        const results = await mapWithConcurrency(shipments, this.options.concurrency, async (shipment, index) => {
            const result = await this.validateUrl(extractImageUrl(shipment));
            return { ...result, index };
        });

        const valid = results.filter(result => result.valid).length;
        logger.info(`Image URL validation finished: ${valid} valid, ${results.length - valid} invalid`);
        return results;
    }

    getStatistics(results: UrlValidationResult[]): ValidationStats {
        const total = results.length;
        const valid = results.filter(result => result.valid).length;
        const invalid = total - valid;
        const errorsByType: Record<string, number> = {};
        const statusCodes: Record<string, number> = {};
        const contentTypes: Record<string, number> = {};

        for (const result of results) {
            if (!result.valid) {
                const error = result.error ?? 'Unknown error';
                errorsByType[error] = (errorsByType[error] ?? 0) + 1;
            }
            if (result.statusCode !== null) {
                const code = String(result.statusCode);
                statusCodes[code] = (statusCodes[code] ?? 0) + 1;
            }
            if (result.contentType) {
                const mainType = result.contentType.split('/')[0];
                contentTypes[mainType] = (contentTypes[mainType] ?? 0) + 1;
            }
        }

        return {
            total,
            valid,
            invalid,
            successPercentage: total > 0 ? roundTo((valid / total) * 100) : 0,
            errorsByType,
            statusCodes,
            contentTypes,
            recommendations: this.buildRecommendations(errorsByType, invalid, total)
        };
    }

    private buildRecommendations(errorsByType: Record<string, number>, invalid: number, total: number): string[] {
        if (invalid === 0) {
            return ['All image URLs are valid.'];
        }

        const recommendations: string[] = [];
        const errors = Object.keys(errorsByType);

        if (total > 0 && (invalid / total) * 100 > 50) {
            recommendations.push('More than 50% of the image URLs are invalid. Review the data source.');
        }
        if (ERROR_MISSING_URL in errorsByType) {
            recommendations.push('Some shipments have no image URL.');
        }
        if (errors.some(error => error.startsWith('Timeout'))) {
            recommendations.push('Consider a longer timeout for slow image hosts.');
        }
        if (errors.some(error => error.startsWith('Invalid status code'))) {
            recommendations.push('Check that the image URLs are still online.');
        }
        if (errors.some(error => error.startsWith('Content type is not an image'))) {
            recommendations.push('Some URLs do not point to image files.');
        }
        return recommendations;
    }
}
