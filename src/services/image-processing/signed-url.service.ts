import axios, { AxiosInstance } from 'axios';
import { StorageGateway } from '@/models/storage';
import { SignedUrlResult, UploadedZip, UrlExpirationInfo } from '@/models/image-processing';
import { baseName, getErrorMessage, logger, NotFoundError, roundTo } from '@/utils';

export type HttpHeadClient = Pick<AxiosInstance, 'head'>;

export const MIN_EXPIRATION_HOURS = 1;
export const MAX_EXPIRATION_HOURS = 24;

export interface SignedUrlCheck {
    valid: boolean;
    statusCode: number | null;
    error: string | null;
    checkedAt: string;
}

const pad = (value: number): string => String(value).padStart(2, '0');

export const clampExpirationHours = (hours: number | undefined, fallback: number): number => {
    const requested = hours ?? fallback;
    return Math.min(MAX_EXPIRATION_HOURS, Math.max(MIN_EXPIRATION_HOURS, requested));
};

export const downloadFilenameFor = (processingUuid: string, objectName: string, now: Date = new Date()): string => {
    const fileName = baseName(objectName);
    if (fileName.includes(processingUuid)) {
        return fileName;
    }
    const stamp = `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}_${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}`;
    return `shipment_images_${processingUuid.slice(0, 8)}_${stamp}.zip`;
};

/**
 * Reads `X-Goog-Date` (yyyyMMddTHHmmssZ) and `X-Goog-Expires` from a v4 signed URL.
 */
export const getUrlExpirationInfo = (signedUrl: string, now: Date = new Date()): UrlExpirationInfo | null => {
    let params: URLSearchParams;
    try {
        params = new URL(signedUrl).searchParams;
    } catch {
        return null;
    }

    const expires = params.get('X-Goog-Expires') ?? '';
    const date = params.get('X-Goog-Date') ?? '';
    const match = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})Z$/.exec(date);
    if (!/^\d+$/.test(expires) || !match) {
        return null;
    }

    const [, year, month, day, hour, minute, second] = match;
    const signedAt = new Date(Date.UTC(+year, +month - 1, +day, +hour, +minute, +second));
    const expiresAt = new Date(signedAt.getTime() + parseInt(expires, 10) * 1000);

    return {
        signedAt,
        expiresAt,
        expiresInSeconds: parseInt(expires, 10),
        expired: now.getTime() >= expiresAt.getTime()
    };
};

export class SignedUrlService {
    constructor(
        private readonly storage: StorageGateway,
        private readonly defaultExpirationHours: number,
        private readonly http: HttpHeadClient = axios.create()
    ) {}

    async generateSignedUrl(upload: UploadedZip, processingUuid: string, expirationHours?: number, now: Date = new Date()): Promise<SignedUrlResult> {
        const hours = clampExpirationHours(expirationHours, this.defaultExpirationHours);

        if (!(await this.storage.exists(upload.bucket, upload.objectName))) {
            throw new NotFoundError(`Object not found for signing: ${upload.gcsUri}`);
        }

        const downloadFilename = downloadFilenameFor(processingUuid, upload.objectName, now);
        const expiresAt = new Date(now.getTime() + hours * 3600 * 1000);
        const signedUrl = await this.storage.getSignedReadUrl(upload.bucket, upload.objectName, {
            expiresAt,
            responseDisposition: `attachment; filename="${downloadFilename}"`
        });

        logger.info('Signed URL generated', { traceId: processingUuid, objectName: upload.objectName, expirationHours: hours });

        return {
            signedUrl,
            objectName: upload.objectName,
            downloadFilename,
            expirationHours: hours,
            expiresAt,
            expiresInSeconds: hours * 3600,
            fileSizeMb: roundTo(upload.sizeBytes / (1024 * 1024))
        };
    }

    async checkSignedUrl(signedUrl: string): Promise<SignedUrlCheck> {
        const checkedAt = new Date().toISOString();
        try {
            const response = await this.http.head(signedUrl, { timeout: 10000, validateStatus: () => true });
            if (response.status === 200) {
                return { valid: true, statusCode: 200, error: null, checkedAt };
            }

            const error = response.status === 403
                ? 'Signed URL expired or invalid'
                : response.status === 404
                    ? 'File not found'
                    : `HTTP error: ${response.status}`;
            return { valid: false, statusCode: response.status, error, checkedAt };
        } catch (error) {
            return { valid: false, statusCode: null, error: getErrorMessage(error), checkedAt };
        }
    }
}
