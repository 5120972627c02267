import { Sequelize } from 'sequelize';
import { initModels, Models } from '@/models';
import {
    IFileProcessing,
    CreateFileProcessingInput,
    FileProcessingUpdate,
    CompletionUpdate,
    FileProcessingModel
} from '@/models/file-processing';
import { logger } from '@/utils';

export class FileProcessingRepository {
    private models: Models;

    constructor(sequelize: Sequelize) {
        this.models = initModels(sequelize);
    }

    async createProcessingRecord(input: CreateFileProcessingInput): Promise<IFileProcessing> {
        try {
            const record = await this.models.FileProcessing.create({
                processingUuid: input.processingUuid,
                fileName: input.fileName,
                totalShipments: input.totalShipments,
                totalPackages: input.totalPackages,
                status: 'processing',
                startedAt: new Date(),
                metadata: input.metadata ?? {}
            });

            logger.info(`Processing record created: ${input.processingUuid}`, { recordId: record.id });
            return this.mapToIFileProcessing(record);
        } catch (error) {
            logger.error('Error in createProcessingRecord', error);
            throw error;
        }
    }

    async getByProcessingUuid(processingUuid: string): Promise<IFileProcessing | null> {
        try {
            const record = await this.models.FileProcessing.findOne({ where: { processingUuid } });
            return record ? this.mapToIFileProcessing(record) : null;
        } catch (error) {
            logger.error('Error in getByProcessingUuid', error);
            throw error;
        }
    }

    async updateStatus(processingUuid: string, update: FileProcessingUpdate): Promise<boolean> {
        try {
            const record = await this.models.FileProcessing.findOne({ where: { processingUuid } });
            if (!record) {
                logger.warn(`Processing record not found for status update: ${processingUuid}`);
                return false;
            }

            const isFinal = update.status === 'completed' || update.status === 'failed';

            await record.update({
                ...(update.status ? { status: update.status } : {}),
                ...(update.result ? { result: update.result } : {}),
                ...(update.errorMessage !== undefined ? { errorMessage: update.errorMessage } : {}),
                ...(isFinal ? { finishedAt: new Date() } : {}),
                metadata: { ...record.metadata, ...update.metadata }
            });

            return true;
        } catch (error) {
            logger.error('Error in updateStatus', error);
            throw error;
        }
    }

    async markCompletion(processingUuid: string, update: CompletionUpdate): Promise<boolean> {
        try {
            const [affectedCount] = await this.models.FileProcessing.update(
                {
                    emailSent: update.emailSent,
                    ...(update.signedUrl !== undefined ? { signedUrl: update.signedUrl } : {}),
                    ...(update.completionData ? { completionData: update.completionData } : {}),
                    updatedAt: new Date()
                },
                { where: { processingUuid } }
            );

            return affectedCount > 0;
        } catch (error) {
            logger.error('Error in markCompletion', error);
            throw error;
        }
    }

    private mapToIFileProcessing(record: FileProcessingModel): IFileProcessing {
        return {
            id: record.id,
            processingUuid: record.processingUuid,
            fileName: record.fileName,
            totalShipments: record.totalShipments,
            totalPackages: record.totalPackages,
            status: record.status,
            startedAt: record.startedAt,
            finishedAt: record.finishedAt ?? null,
            result: record.result ?? null,
            errorMessage: record.errorMessage ?? null,
            metadata: record.metadata ?? {},
            emailSent: Boolean(record.emailSent),
            signedUrl: record.signedUrl ?? null,
            completionData: record.completionData ?? null,
            createdAt: record.createdAt,
            updatedAt: record.updatedAt
        };
    }
}
