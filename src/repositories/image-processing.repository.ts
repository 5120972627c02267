import { Sequelize } from 'sequelize';
import { initModels, Models } from '@/models';
import { IImageProcessing, ImageProcessingCompletion, ImageProcessingModel } from '@/models/image-processing';
import { logger } from '@/utils';

export class ImageProcessingRepository {
    private models: Models;

    constructor(sequelize: Sequelize) {
        this.models = initModels(sequelize);
    }

    async startPackage(processingUuid: string, packageName: string, packageUri: string): Promise<IImageProcessing> {
        try {
            const record = await this.models.ImageProcessing.create({
                processingUuid,
                packageName,
                packageUri,
                status: 'in_progress',
                startedAt: new Date()
            });
            return this.mapToIImageProcessing(record);
        } catch (error) {
            logger.error('Error in startPackage', error);
            throw error;
        }
    }

    async completePackage(id: number, completion: ImageProcessingCompletion): Promise<boolean> {
        try {
            const [affectedCount] = await this.models.ImageProcessing.update(
                {
                    status: 'completed',
                    imagesProcessed: completion.imagesProcessed,
                    imagesFailed: completion.imagesFailed,
                    zipObjectName: completion.zipObjectName,
                    signedUrl: completion.signedUrl,
                    expiresAt: completion.expiresAt,
                    result: completion.result,
                    finishedAt: new Date()
                },
                { where: { id } }
            );
            return affectedCount > 0;
        } catch (error) {
            logger.error('Error in completePackage', error);
            throw error;
        }
    }

    async failPackage(id: number, errorMessage: string): Promise<boolean> {
        try {
            const [affectedCount] = await this.models.ImageProcessing.update(
                { status: 'failed', errorMessage, finishedAt: new Date() },
                { where: { id } }
            );
            return affectedCount > 0;
        } catch (error) {
            logger.error('Error in failPackage', error);
            throw error;
        }
    }

    async getByProcessingUuid(processingUuid: string): Promise<IImageProcessing[]> {
        try {
            const records = await this.models.ImageProcessing.findAll({
                where: { processingUuid },
                order: [['startedAt', 'ASC'], ['id', 'ASC']]
            });
            return records.map(record => this.mapToIImageProcessing(record));
        } catch (error) {
            logger.error('Error in getByProcessingUuid', error);
            throw error;
        }
    }

    private mapToIImageProcessing(record: ImageProcessingModel): IImageProcessing {
        return {
            id: record.id,
            processingUuid: record.processingUuid,
            packageName: record.packageName,
            packageUri: record.packageUri,
            status: record.status,
            imagesProcessed: record.imagesProcessed,
            imagesFailed: record.imagesFailed,
            zipObjectName: record.zipObjectName ?? null,
            signedUrl: record.signedUrl ?? null,
            expiresAt: record.expiresAt ?? null,
            result: record.result ?? null,
            errorMessage: record.errorMessage ?? null,
            startedAt: record.startedAt,
            finishedAt: record.finishedAt ?? null,
            createdAt: record.createdAt,
            updatedAt: record.updatedAt
        };
    }
}
