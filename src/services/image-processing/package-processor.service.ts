import { EmailRequestMessage, MessagePublisher } from '@/models/messaging';
import { ShipmentRecord } from '@/models/shipment';
import { StorageGateway } from '@/models/storage';
import { PackageProcessingResult, ProcessingStatusReport } from '@/models/image-processing';
import { FileProcessingRepository, ImageProcessingRepository } from '@/repositories';
import { baseName, getErrorMessage, isRecord, logger, NotFoundError, parseGcsUri, roundTo, ValidationError } from '@/utils';
import { ProcessPackageRequest, WorkflowTrigger } from '@/utils/validation';
import { reportProcessingError } from '../pubsub/pubsub.service';
import { getShipmentList } from '../division/shipment-document';
import { ImageDownloaderService } from './image-downloader.service';
import { ZipCreatorService } from './zip-creator.service';
import { SignedUrlService } from './signed-url.service';
import { CleanupSchedulerService } from './cleanup-scheduler.service';

export interface BatchProcessingResult {
    processingUuid: string;
    originalFile: string | null;
    packagesProcessed: number;
    packagesFailed: number;
    results: PackageProcessingResult[];
    failures: Array<{ packageUri: string; error: string }>;
    cleanupScheduledFor: string | null;
    emailMessageId: string | null;
}

export interface PackageRunOptions {
    notify: boolean;
    scheduleCleanup: boolean;
}

export const extractPackageNumber = (packageName: string): string => {
    const match = /(\d+)_of_(\d+)/.exec(packageName);
    return match ? `${match[1]}_of_${match[2]}` : '1_of_1';
};

/**
 * Collects the image paths referenced by the shipments, first occurrence wins.
 */
export const extractImagePaths = (shipments: ShipmentRecord[]): string[] => {
    const paths = new Set<string>();
    for (const shipment of shipments) {
        const images = shipment.images;
        if (!Array.isArray(images)) continue;

        for (const image of images) {
            if (typeof image === 'string' && image.trim()) {
                paths.add(image.trim());
            } else if (isRecord(image) && typeof image.path === 'string' && image.path.trim()) {
                paths.add(image.path.trim());
            }
        }
    }
    return [...paths];
};

export class PackageProcessorService {
    constructor(
        private readonly storage: StorageGateway,
        private readonly downloader: ImageDownloaderService,
        private readonly zipCreator: ZipCreatorService,
        private readonly signedUrls: SignedUrlService,
        private readonly cleanupScheduler: CleanupSchedulerService,
        private readonly imageRepo: ImageProcessingRepository,
        private readonly fileRepo: FileProcessingRepository,
        private readonly publisher: MessagePublisher
    ) {}

    async processPackage(
        request: ProcessPackageRequest,
        options: PackageRunOptions = { notify: true, scheduleCleanup: true }
    ): Promise<PackageProcessingResult> {
        const { processingUuid, packageUri } = request;
        const location = parseGcsUri(packageUri);
        const packageName = request.packageName ?? baseName(location.path);
        const packageNumber = extractPackageNumber(packageName);
        const log = logger.child({ traceId: processingUuid, packageName });

        const record = await this.imageRepo.startPackage(processingUuid, packageName, packageUri);

        try {
            const document = await this.storage.readJson(location.bucket, location.path);
            const { shipments } = getShipmentList(document);
            const imagePaths = extractImagePaths(shipments);
            if (imagePaths.length === 0) {
                throw new ValidationError(`Package ${packageName} references no images`);
            }

            log.info(`Processing package ${packageNumber} with ${imagePaths.length} images`);

            const download = await this.downloader.downloadPackageImages(imagePaths, processingUuid, packageNumber);
            if (download.successfulDownloads === 0) {
                throw new Error(`None of the ${imagePaths.length} images of ${packageName} could be downloaded`);
            }

            const zip = await this.zipCreator.createZip(download);
            const upload = await this.zipCreator.uploadZip(zip, processingUuid, packageNumber);
            const signed = await this.signedUrls.generateSignedUrl(upload, processingUuid);
            const cleanupScheduledFor = options.scheduleCleanup ? await this.scheduleCleanup(processingUuid) : null;

            const result: PackageProcessingResult = {
                status: 'success',
                processingUuid,
                packageName,
                packageNumber,
                imagesRequested: imagePaths.length,
                imagesProcessed: download.successfulDownloads,
                imagesFailed: download.failedDownloads,
                zipObject: upload.gcsUri,
                zipSizeMb: signed.fileSizeMb,
                compressionRatioPercent: zip.compressionRatioPercent,
                signedUrl: signed.signedUrl,
                downloadFilename: signed.downloadFilename,
                expirationHours: signed.expirationHours,
                expirationDatetime: signed.expiresAt.toISOString(),
                cleanupScheduledFor,
                emailMessageId: null,
                timestamp: new Date().toISOString()
            };

            await this.imageRepo.completePackage(record.id, {
                imagesProcessed: result.imagesProcessed,
                imagesFailed: result.imagesFailed,
                zipObjectName: upload.objectName,
                signedUrl: signed.signedUrl,
                expiresAt: signed.expiresAt,
                result: {
                    zipObject: result.zipObject,
                    zipSizeMb: result.zipSizeMb,
                    compressionRatioPercent: result.compressionRatioPercent,
                    sha256: zip.sha256,
                    downloadFilename: result.downloadFilename
                }
            });

            await this.notifyImagesReady(result, upload.objectName);
            if (options.notify) {
                result.emailMessageId = await this.requestEmail({
                    action: 'send_completion_email',
                    processingUuid,
                    packageName,
                    signedUrl: result.signedUrl,
                    downloadFilename: result.downloadFilename,
                    expirationDatetime: result.expirationDatetime,
                    expirationHours: result.expirationHours,
                    fileSizeMb: result.zipSizeMb,
                    imagesProcessed: result.imagesProcessed,
                    imagesFailed: result.imagesFailed,
                    compressionRatioPercent: result.compressionRatioPercent
                });
            }

            log.info('Package processed', { imagesProcessed: result.imagesProcessed, zipSizeMb: result.zipSizeMb });
            return result;
        } catch (error) {
            await this.markPackageFailed(record.id, processingUuid, error);
            if (!(error instanceof ValidationError)) {
                await reportProcessingError(this.publisher, {
                    processingUuid,
                    errorMessage: getErrorMessage(error),
                    severity: 'error',
                    context: { packageUri, packageName },
                    stack: error instanceof Error ? error.stack : undefined
                });
            }
            throw error;
        }
    }

    async processPublishedPackages(trigger: WorkflowTrigger): Promise<BatchProcessingResult> {
        const results: PackageProcessingResult[] = [];
        const failures: Array<{ packageUri: string; error: string }> = [];

        for (const packageUri of trigger.packages) {
            try {
                results.push(await this.processPackage(
                    { processingUuid: trigger.processingUuid, packageUri },
                    { notify: false, scheduleCleanup: false }
                ));
            } catch (error) {
                failures.push({ packageUri, error: getErrorMessage(error) });
            }
        }

        if (results.length === 0) {
            throw new Error(`No package of ${trigger.processingUuid} could be processed`);
        }

        // One cleanup covers every ZIP under the processing prefix.
        const cleanupScheduledFor = await this.scheduleCleanup(trigger.processingUuid);
        for (const result of results) {
            result.cleanupScheduledFor = cleanupScheduledFor;
        }

        const emailMessageId = await this.requestEmail({
            action: 'send_completion_email',
            processingUuid: trigger.processingUuid,
            signedUrl: results[0].signedUrl,
            signedUrls: results.map(result => result.signedUrl),
            downloadFilename: results[0].downloadFilename,
            expirationHours: Math.min(...results.map(result => result.expirationHours)),
            expirationDatetime: results.map(result => result.expirationDatetime).sort()[0],
            fileSizeMb: roundTo(results.reduce((sum, result) => sum + result.zipSizeMb, 0)),
            imagesProcessed: results.reduce((sum, result) => sum + result.imagesProcessed, 0),
            imagesFailed: results.reduce((sum, result) => sum + result.imagesFailed, 0)
        });

        return {
            processingUuid: trigger.processingUuid,
            originalFile: trigger.originalFile ?? null,
            packagesProcessed: results.length,
            packagesFailed: failures.length,
            results,
            failures,
            cleanupScheduledFor,
            emailMessageId
        };
    }

    async getProcessingStatus(processingUuid: string): Promise<ProcessingStatusReport> {
        const [rows, fileRecord] = await Promise.all([
            this.imageRepo.getByProcessingUuid(processingUuid),
            this.fileRepo.getByProcessingUuid(processingUuid)
        ]);

        if (rows.length === 0 && !fileRecord) {
            throw new NotFoundError(`No processing found for ${processingUuid}`);
        }

        const completed = rows.filter(row => row.status === 'completed').length;
        const failed = rows.filter(row => row.status === 'failed').length;
        const inProgress = rows.filter(row => row.status === 'in_progress').length;
        const expectedPackages = fileRecord ? fileRecord.totalPackages : null;
        const denominator = expectedPackages ?? rows.length;

        return {
            processingUuid,
            expectedPackages,
            completed,
            failed,
            inProgress,
            completionPercentage: denominator > 0 ? roundTo(Math.min(completed, denominator) / denominator * 100) : 0,
            isComplete: expectedPackages !== null && completed >= expectedPackages,
            packages: rows.map(row => ({
                packageName: row.packageName,
                status: row.status,
                imagesProcessed: row.imagesProcessed,
                imagesFailed: row.imagesFailed,
                signedUrl: row.signedUrl,
                errorMessage: row.errorMessage
            }))
        };
    }

    private async scheduleCleanup(processingUuid: string): Promise<string | null> {
        try {
            const scheduled = await this.cleanupScheduler.scheduleCleanup(processingUuid);
            return scheduled.scheduledFor;
        } catch (error) {
            logger.warn('Cleanup could not be scheduled', { traceId: processingUuid, error: getErrorMessage(error) });
            return null;
        }
    }

    private async notifyImagesReady(result: PackageProcessingResult, zipObject: string): Promise<void> {
        try {
            await this.publisher.publishImagesReady({
                processingUuid: result.processingUuid,
                packageName: result.packageName,
                zipObject,
                imagesProcessed: result.imagesProcessed
            });
        } catch (error) {
            logger.warn('images-ready message not published', { traceId: result.processingUuid, error: getErrorMessage(error) });
        }
    }

    private async requestEmail(message: EmailRequestMessage): Promise<string | null> {
        try {
            return await this.publisher.publishEmailRequest(message);
        } catch (error) {
            logger.error('Email request not published', error, { traceId: message.processingUuid });
            await reportProcessingError(this.publisher, {
                processingUuid: message.processingUuid,
                errorMessage: `Email request not published: ${getErrorMessage(error)}`,
                severity: 'warning'
            });
            return null;
        }
    }

    private async markPackageFailed(recordId: number, processingUuid: string, error: unknown): Promise<void> {
        try {
            await this.imageRepo.failPackage(recordId, getErrorMessage(error));
        } catch (updateError) {
            logger.error('Failed to mark package as failed', updateError, { traceId: processingUuid });
        }
    }
}
