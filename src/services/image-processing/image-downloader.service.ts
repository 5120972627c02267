import path from 'path';
import axios, { AxiosInstance } from 'axios';
import { StorageGateway } from '@/models/storage';
import {
    DownloadedImage,
    ImageDownloadResult,
    ImageSourceType,
    PackageDownloadResult
} from '@/models/image-processing';
import { getErrorMessage, isGcsUri, logger, parseGcsUri, roundTo } from '@/utils';

export type HttpGetClient = Pick<AxiosInstance, 'get'>;

export interface ImageDownloaderOptions {
    originalsBucket: string;
    maxImageSizeMb: number;
    timeoutMs: number;
}

export const VALID_IMAGE_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.gif', '.webp', '.bmp', '.tiff', '.tif', '.svg'];

const BYTES_PER_MB = 1024 * 1024;

export const getFileExtension = (filePath: string): string => path.extname(filePath).toLowerCase();

export const isValidImageExtension = (extension: string): boolean =>
    VALID_IMAGE_EXTENSIONS.includes(extension.toLowerCase());

const isHttpUrl = (value: string): boolean => /^https?:\/\//i.test(value);

export class ImageDownloaderService {
    constructor(
        private readonly storage: StorageGateway,
        private readonly options: ImageDownloaderOptions,
        private readonly http: HttpGetClient = axios.create()
    ) {}

    async downloadPackageImages(imagePaths: string[], processingUuid: string, packageNumber: string): Promise<PackageDownloadResult> {
        logger.info(`Downloading ${imagePaths.length} images for package ${packageNumber}`, { traceId: processingUuid });

        const results: ImageDownloadResult[] = [];
        for (const [index, imagePath] of imagePaths.entries()) {
            results.push(await this.downloadImage(imagePath, `image_${index + 1}`));
        }

        const successful = results.filter((result): result is DownloadedImage => result.success);
        const totalSizeBytes = successful.reduce((sum, result) => sum + result.sizeBytes, 0);

        const summary: PackageDownloadResult = {
            processingUuid,
            packageNumber,
            totalImages: imagePaths.length,
            successfulDownloads: successful.length,
            failedDownloads: results.length - successful.length,
            totalSizeBytes,
            totalSizeMb: roundTo(totalSizeBytes / BYTES_PER_MB),
            results,
            timestamp: new Date().toISOString()
        };

        logger.info(`Downloads finished for package ${packageNumber}`, {
            traceId: processingUuid,
            successful: summary.successfulDownloads,
            failed: summary.failedDownloads,
            totalSizeMb: summary.totalSizeMb
        });
        return summary;
    }

    async downloadImage(imagePath: string, fileNamePrefix: string): Promise<ImageDownloadResult> {
        try {
            if (isHttpUrl(imagePath)) {
                return await this.downloadFromHttp(imagePath, fileNamePrefix);
            }
            const gcsPath = isGcsUri(imagePath)
                ? imagePath
                : `gs://${this.options.originalsBucket}/${imagePath.replace(/^\/+/, '')}`;
            return await this.downloadFromGcs(imagePath, gcsPath, fileNamePrefix);
        } catch (error) {
            logger.warn(`Image download failed: ${imagePath}`, { error: getErrorMessage(error) });
            return { imagePath, success: false, error: getErrorMessage(error), sizeBytes: 0 };
        }
    }

    private async downloadFromGcs(imagePath: string, gcsPath: string, fileNamePrefix: string): Promise<DownloadedImage> {
        const { bucket, path: objectName } = parseGcsUri(gcsPath);
        const extension = getFileExtension(objectName);
        if (!isValidImageExtension(extension)) {
            throw new Error(`Invalid image extension: ${extension || '(none)'}`);
        }

        const size = await this.storage.getSize(bucket, objectName);
        if (size === null) {
            throw new Error(`Image not found: ${gcsPath}`);
        }
        this.assertSize(size);

        const content = await this.storage.download(bucket, objectName);
        return this.toResult(imagePath, fileNamePrefix, extension, content, 'gcs');
    }

    private async downloadFromHttp(url: string, fileNamePrefix: string): Promise<DownloadedImage> {
        const extension = getFileExtension(new URL(url).pathname) || '.jpg';
        if (!isValidImageExtension(extension)) {
            throw new Error(`Invalid image extension: ${extension}`);
        }

        const response = await this.http.get<ArrayBuffer>(url, {
            responseType: 'arraybuffer',
            timeout: this.options.timeoutMs,
            maxContentLength: this.options.maxImageSizeMb * BYTES_PER_MB
        });
        const content = Buffer.from(response.data);
        this.assertSize(content.length);

        return this.toResult(url, fileNamePrefix, extension, content, 'http');
    }

    private assertSize(sizeBytes: number): void {
        const sizeMb = sizeBytes / BYTES_PER_MB;
        if (sizeMb > this.options.maxImageSizeMb) {
            throw new Error(`Image too large: ${roundTo(sizeMb)}MB (max ${this.options.maxImageSizeMb}MB)`);
        }
    }

    private toResult(
        imagePath: string,
        fileNamePrefix: string,
        fileExtension: string,
        content: Buffer,
        sourceType: ImageSourceType
    ): DownloadedImage {
        return {
            imagePath,
            success: true,
            fileName: `${fileNamePrefix}${fileExtension}`,
            content,
            sizeBytes: content.length,
            fileExtension,
            sourceType
        };
    }
}
