import { v4 as uuidv4 } from 'uuid';
import { BucketConfig, ProcessingConfig } from '@/config/pipeline.config';
import { MessagePublisher } from '@/models/messaging';
import { DivisionResult, ValidationStats, UrlValidationResult } from '@/models/shipment';
import { StorageGateway } from '@/models/storage';
import { IFileProcessing } from '@/models/file-processing';
import { FileProcessingRepository, ShipmentImageRepository } from '@/repositories';
import { FileNotReadyError, getErrorMessage, isRecord, logger, ValidationError } from '@/utils';
import { reportProcessingError } from '../pubsub/pubsub.service';
import { waitForFileCompletion } from '../storage/file-completion';
import { FileValidatorService } from './file-validator.service';
import { ImageUrlValidatorService } from './image-url-validator.service';
import { computeImageCoverage, countPackages, splitIntoPackages } from './package-splitter';
import { getShipmentId, getShipmentList } from './shipment-document';

export interface ServiceIdentity {
    origin: string;
    version: string;
}

export type FileRequestCheck =
    | { accepted: true }
    | { accepted: false; reason: string };

export type DivisionOutcome =
    | { kind: 'ignored'; reason: string }
    | { kind: 'processed'; result: DivisionResult };

export class DivisionProcessorService {
    constructor(
        private readonly storage: StorageGateway,
        private readonly fileValidator: FileValidatorService,
        private readonly urlValidator: ImageUrlValidatorService,
        private readonly fileRepo: FileProcessingRepository,
        private readonly imageRepo: ShipmentImageRepository,
        private readonly publisher: MessagePublisher,
        private readonly buckets: BucketConfig,
        private readonly processing: ProcessingConfig,
        private readonly identity: ServiceIdentity
    ) {}

    checkFileRequest(bucket: string, name: string): FileRequestCheck {
        if (bucket !== this.buckets.jsonPending) {
            return { accepted: false, reason: `File from unexpected bucket: ${bucket}` };
        }
        if (!name.endsWith('.json')) {
            return { accepted: false, reason: `Not a JSON file: ${name}` };
        }
        if (name.startsWith('.') || name.includes('/tmp/')) {
            return { accepted: false, reason: `Temporary or hidden file: ${name}` };
        }
        return { accepted: true };
    }

    async handleStorageEvent(bucket: string, name: string, traceId: string): Promise<DivisionOutcome> {
        const check = this.checkFileRequest(bucket, name);
        if (!check.accepted) {
            logger.info(`Storage event ignored: ${check.reason}`, { traceId });
            return { kind: 'ignored', reason: check.reason };
        }

        const complete = await waitForFileCompletion(this.storage, bucket, name, {
            timeoutMs: this.processing.fileCompletionTimeoutSeconds * 1000,
            pollMs: this.processing.fileCompletionPollMs,
            traceId
        });
        if (!complete) {
            throw new FileNotReadyError(`File did not finish uploading within ${this.processing.fileCompletionTimeoutSeconds} seconds`);
        }

        const result = await this.processFile(bucket, name, traceId);
        return { kind: 'processed', result };
    }

    async processFile(bucket: string, name: string, traceId: string): Promise<DivisionResult> {
        const processingUuid = uuidv4();
        const log = logger.child({ traceId, processingUuid });
        let record: IFileProcessing | null = null;

        try {
            const document = await this.readDocument(bucket, name);
            const validation = this.fileValidator.validateDocument(document);
            if (!validation.valid || !isRecord(document)) {
                throw new ValidationError('Invalid file structure', validation.errors);
            }

            const { shipments } = getShipmentList(document);
            const totalPackages = countPackages(shipments.length, this.processing.maxShipmentsPerFile);
            log.info(`Dividing ${name}: ${shipments.length} shipments into ${totalPackages} packages`);

            record = await this.fileRepo.createProcessingRecord({
                processingUuid,
                fileName: name,
                totalShipments: shipments.length,
                totalPackages,
                metadata: {
                    serviceVersion: this.identity.version,
                    traceId,
                    sourceBucket: bucket,
                    startedAt: new Date().toISOString()
                }
            });

            const shipmentIds = shipments.flatMap(shipment => {
                const id = getShipmentId(shipment);
                return id === null ? [] : [id];
            });
            const imagePaths = await this.imageRepo.getImagePathsByShipmentIds(shipmentIds);

            let imageValidation: UrlValidationResult[] | undefined;
            let urlValidation: ValidationStats | null = null;
            if (this.processing.validateImageUrls) {
                imageValidation = await this.urlValidator.validateShipments(shipments);
                urlValidation = this.urlValidator.getStatistics(imageValidation);
            }

            const packages = splitIntoPackages(document, {
                maxPerPackage: this.processing.maxShipmentsPerFile,
                processingUuid,
                originalFile: name,
                imagePaths,
                serviceOrigin: this.identity.origin,
                serviceVersion: this.identity.version,
                imageValidation,
                getValidationStats: results => this.urlValidator.getStatistics(results)
            });

            const filesMoved: string[] = [];
            for (const pkg of packages) {
                const uri = await this.storage.writeJson(this.buckets.jsonToProcess, pkg.fileName, pkg.document, {
                    processingUuid,
                    packageNumber: String(pkg.metadata.packageNumber),
                    totalPackages: String(pkg.metadata.totalPackages),
                    originalFile: name
                });
                filesMoved.push(uri);
            }

            await this.storage.delete(bucket, name);

            const imageCoverage = computeImageCoverage(shipments.length, imagePaths);
            await this.fileRepo.updateStatus(processingUuid, {
                status: 'completed',
                result: {
                    packagesCreated: packages.length,
                    filesMoved,
                    totalShipments: shipments.length,
                    imageCoverage,
                    ...(urlValidation ? { urlValidation } : {})
                },
                metadata: { completedAt: new Date().toISOString() }
            });

            const workflowMessageId = await this.triggerWorkflow(processingUuid, name, filesMoved, shipments.length);

            log.info(`Division completed: ${packages.length} packages written`);

            return {
                status: 'success',
                processingUuid,
                originalFile: name,
                totalShipments: shipments.length,
                packagesCreated: packages.length,
                filesMoved,
                databaseRecordId: record.id,
                imageCoverage,
                urlValidation,
                workflowMessageId,
                timestamp: new Date().toISOString()
            };
        } catch (error) {
            if (record) {
                await this.markFailed(processingUuid, error);
            }
            if (!(error instanceof ValidationError)) {
                await reportProcessingError(this.publisher, {
                    processingUuid,
                    errorMessage: getErrorMessage(error),
                    severity: 'error',
                    context: { fileName: name, bucket, traceId },
                    stack: error instanceof Error ? error.stack : undefined
                });
            }
            throw error;
        }
    }

    async getProcessingRecord(processingUuid: string): Promise<IFileProcessing | null> {
        return this.fileRepo.getByProcessingUuid(processingUuid);
    }

    private async readDocument(bucket: string, name: string): Promise<unknown> {
        try {
            return await this.storage.readJson(bucket, name);
        } catch (error) {
            if (error instanceof SyntaxError) {
                throw new ValidationError('Invalid file structure', [`File is not valid JSON: ${error.message}`]);
            }
            throw error;
        }
    }

    private async triggerWorkflow(processingUuid: string, originalFile: string, packages: string[], totalShipments: number): Promise<string | null> {
        try {
            return await this.publisher.publishWorkflowTrigger({
                processingUuid,
                originalFile,
                packages,
                totalShipments,
                packagesCreated: packages.length
            });
        } catch (error) {
            logger.error('Failed to publish workflow trigger', error, { traceId: processingUuid });
            await reportProcessingError(this.publisher, {
                processingUuid,
                errorMessage: `Workflow trigger not published: ${getErrorMessage(error)}`,
                severity: 'critical',
                context: { originalFile, packages }
            });
            return null;
        }
    }

    private async markFailed(processingUuid: string, error: unknown): Promise<void> {
        try {
            await this.fileRepo.updateStatus(processingUuid, {
                status: 'failed',
                errorMessage: getErrorMessage(error)
            });
        } catch (updateError) {
            logger.error('Failed to mark processing record as failed', updateError, { traceId: processingUuid });
        }
    }
}
