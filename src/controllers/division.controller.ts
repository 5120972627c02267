import { Request, RequestHandler, Response, Router } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { DivisionProcessorService } from '@/services/division/division-processor.service';
import { FileValidatorService } from '@/services/division/file-validator.service';
import { ImageUrlValidatorService } from '@/services/division/image-url-validator.service';
import { extractEventData, NotFoundError, RequestLogger, ResponseUtils } from '@/utils';
import { fileStatisticsQuerySchema, parseWithSchema, storageEventSchema, validateImagesSchema } from '@/utils/validation';

export class DivisionController {
    constructor(
        private readonly divisionProcessor: DivisionProcessorService,
        private readonly fileValidator: FileValidatorService,
        private readonly urlValidator: ImageUrlValidatorService,
        private readonly requestLogger: RequestLogger,
        private readonly internalAuth: RequestHandler,
        private readonly defaultBucket: string
    ) {}

    public processFile = async (req: Request, res: Response): Promise<Response> => {
        try {
            this.requestLogger.logRequest('processFile', req);

            const event = parseWithSchema(storageEventSchema, extractEventData(req.body), 'storage event');
            const outcome = await this.divisionProcessor.handleStorageEvent(event.bucket, event.name, req.traceId ?? uuidv4());

            if (outcome.kind === 'ignored') {
                return ResponseUtils.handleSuccess(res, outcome.reason);
            }

            return ResponseUtils.handleSuccess(res, 'File divided successfully', outcome.result);
        } catch (error) {
            return ResponseUtils.handleError(res, 'Failed to process file', error);
        }
    };

    public getProcessingByUuid = async (req: Request, res: Response): Promise<Response> => {
        try {
            this.requestLogger.logRequest('getProcessingByUuid', req);

            const { processingUuid } = req.params;
            const record = await this.divisionProcessor.getProcessingRecord(processingUuid);
            if (!record) {
                throw new NotFoundError(`Processing not found: ${processingUuid}`);
            }

            return ResponseUtils.handleSuccess(res, 'Processing record retrieved', record);
        } catch (error) {
            return ResponseUtils.handleError(res, 'Failed to get processing record', error);
        }
    };

    public validateImages = async (req: Request, res: Response): Promise<Response> => {
        try {
            this.requestLogger.logRequest('validateImages', req);

            const { shipments } = parseWithSchema(validateImagesSchema, req.body);
            const results = await this.urlValidator.validateShipments(shipments);
            const statistics = this.urlValidator.getStatistics(results);

            return ResponseUtils.handleSuccess(res, 'Image URLs validated', { results, statistics });
        } catch (error) {
            return ResponseUtils.handleError(res, 'Failed to validate image URLs', error);
        }
    };

    public getFileStatistics = async (req: Request, res: Response): Promise<Response> => {
        try {
            this.requestLogger.logRequest('getFileStatistics', req);

            const query = parseWithSchema(fileStatisticsQuerySchema, req.query, 'query');
            const bucket = query.bucket ?? this.defaultBucket;
            const statistics = await this.fileValidator.getFileStatistics(bucket, query.name);

            return ResponseUtils.handleSuccess(res, 'File statistics computed', { bucket, name: query.name, statistics });
        } catch (error) {
            return ResponseUtils.handleError(res, 'Failed to compute file statistics', error);
        }
    };

    public getRoutes(): Router {
        const router = Router();

        router.post('/process-file', this.processFile);
        router.get('/process-by-uuid/:processingUuid', this.getProcessingByUuid);
        router.post('/validate-images', this.validateImages);
        router.get('/file-statistics', this.internalAuth, this.getFileStatistics);

        return router;
    }
}
