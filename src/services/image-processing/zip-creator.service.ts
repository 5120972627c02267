import { createHash } from 'crypto';
import archiver from 'archiver';
import { StorageGateway } from '@/models/storage';
import { DownloadedImage, PackageDownloadResult, UploadedZip, ZipArchive } from '@/models/image-processing';
import { logger, roundTo, toGcsUri } from '@/utils';

export const METADATA_ENTRY = 'package_metadata.json';

export const zipFileNameFor = (processingUuid: string, packageNumber: string): string =>
    `${processingUuid}_${packageNumber}_images.zip`;

export class ZipCreatorService {
    constructor(
        private readonly storage: StorageGateway,
        private readonly tempBucket: string,
        private readonly serviceVersion: string,
        private readonly compressionLevel: number = 6
    ) {}

    async createZip(download: PackageDownloadResult): Promise<ZipArchive> {
        const images = download.results.filter((result): result is DownloadedImage => result.success);
        if (images.length === 0) {
            throw new Error('No downloaded images to put in the archive');
        }

        const zipFileName = zipFileNameFor(download.processingUuid, download.packageNumber);
        const metadata = this.buildPackageMetadata(download, images);
        const buffer = await this.buildArchive([
            { name: METADATA_ENTRY, content: Buffer.from(JSON.stringify(metadata, null, 2), 'utf8') },
            ...images.map(image => ({ name: image.fileName, content: image.content }))
        ]);

        const originalSizeBytes = download.totalSizeBytes;
        const compressionRatioPercent = originalSizeBytes > 0
            ? roundTo(((originalSizeBytes - buffer.length) / originalSizeBytes) * 100)
            : 0;

        logger.info(`ZIP created: ${zipFileName}`, {
            traceId: download.processingUuid,
            filesAdded: images.length,
            zipSizeBytes: buffer.length,
            compressionRatioPercent
        });

        return {
            zipFileName,
            buffer,
            filesAdded: images.length,
            zipSizeBytes: buffer.length,
            originalSizeBytes,
            compressionRatioPercent,
            sha256: createHash('sha256').update(buffer).digest('hex')
        };
    }

    async uploadZip(zip: ZipArchive, processingUuid: string, packageNumber: string): Promise<UploadedZip> {
        const objectName = `${processingUuid}/${zip.zipFileName}`;
        const sizeBytes = await this.storage.upload(this.tempBucket, objectName, zip.buffer, {
            contentType: 'application/zip',
            metadata: {
                processingUuid,
                packageNumber,
                sha256: zip.sha256,
                filesCount: String(zip.filesAdded),
                compressionRatio: String(zip.compressionRatioPercent),
                createdAt: new Date().toISOString()
            }
        });

        if (sizeBytes !== zip.zipSizeBytes) {
            throw new Error(`Uploaded size mismatch for ${objectName}: expected ${zip.zipSizeBytes}, stored ${sizeBytes}`);
        }

        return {
            bucket: this.tempBucket,
            objectName,
            gcsUri: toGcsUri(this.tempBucket, objectName),
            sizeBytes
        };
    }

    private buildPackageMetadata(download: PackageDownloadResult, images: DownloadedImage[]) {
        return {
            packageInfo: {
                processingUuid: download.processingUuid,
                packageNumber: download.packageNumber,
                createdAt: download.timestamp,
                serviceVersion: this.serviceVersion
            },
            imagesSummary: {
                totalRequested: download.totalImages,
                successfulDownloads: download.successfulDownloads,
                failedDownloads: download.failedDownloads,
                totalSizeBytes: download.totalSizeBytes,
                totalSizeMb: download.totalSizeMb
            },
            downloadDetails: images.map(image => ({
                originalPath: image.imagePath,
                fileName: image.fileName,
                sizeBytes: image.sizeBytes,
                fileExtension: image.fileExtension,
                sourceType: image.sourceType
            }))
        };
    }

    private buildArchive(entries: Array<{ name: string; content: Buffer }>): Promise<Buffer> {
        return new Promise<Buffer>((resolve, reject) => {
            const archive = archiver('zip', { zlib: { level: this.compressionLevel } });
            const chunks: Buffer[] = [];

            archive.on('data', (chunk: Buffer) => chunks.push(chunk));
            archive.on('end', () => resolve(Buffer.concat(chunks)));
            archive.on('warning', warning => logger.warn('ZIP warning', { warning: warning.message }));
            archive.on('error', reject);

            for (const entry of entries) {
                archive.append(entry.content, { name: entry.name });
            }
            archive.finalize().catch(reject);
        });
    }
}
