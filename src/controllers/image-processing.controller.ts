import { Request, RequestHandler, Response, Router } from 'express';
import { CleanupSchedulerService } from '@/services/image-processing/cleanup-scheduler.service';
import { PackageProcessorService } from '@/services/image-processing/package-processor.service';
import { extractEventData, RequestLogger, ResponseUtils } from '@/utils';
import { parseWithSchema, processPackageSchema, scheduleCleanupSchema, workflowTriggerSchema } from '@/utils/validation';

export class ImageProcessingController {
    constructor(
        private readonly packageProcessor: PackageProcessorService,
        private readonly cleanupScheduler: CleanupSchedulerService,
        private readonly requestLogger: RequestLogger,
        private readonly internalAuth: RequestHandler
    ) {}

    public processPackage = async (req: Request, res: Response): Promise<Response> => {
        try {
            this.requestLogger.logRequest('processPackage', req);

            const request = parseWithSchema(processPackageSchema, req.body);
            const result = await this.packageProcessor.processPackage(request);

            return ResponseUtils.handleSuccess(res, 'Package processed successfully', result);
        } catch (error) {
            return ResponseUtils.handleError(res, 'Failed to process package', error);
        }
    };

    public processPubSub = async (req: Request, res: Response): Promise<Response> => {
        try {
            this.requestLogger.logRequest('processPubSub', req);

            const trigger = parseWithSchema(workflowTriggerSchema, extractEventData(req.body), 'workflow trigger');
            const result = await this.packageProcessor.processPublishedPackages(trigger);

            return ResponseUtils.handleSuccess(res, `Processed ${result.packagesProcessed} packages`, result);
        } catch (error) {
            return ResponseUtils.handleError(res, 'Failed to process workflow trigger', error);
        }
    };

    public getProcessingStatus = async (req: Request, res: Response): Promise<Response> => {
        try {
            this.requestLogger.logRequest('getProcessingStatus', req);

            const status = await this.packageProcessor.getProcessingStatus(req.params.processingUuid);
            return ResponseUtils.handleSuccess(res, 'Processing status retrieved', status);
        } catch (error) {
            return ResponseUtils.handleError(res, 'Failed to get processing status', error);
        }
    };

    public scheduleCleanup = async (req: Request, res: Response): Promise<Response> => {
        try {
            this.requestLogger.logRequest('scheduleCleanup', req);

            const { processingUuid, cleanupAfterHours } = parseWithSchema(scheduleCleanupSchema, req.body);
            const scheduled = await this.cleanupScheduler.scheduleCleanup(processingUuid, cleanupAfterHours);

            return ResponseUtils.handleSuccess(res, 'Cleanup scheduled', scheduled);
        } catch (error) {
            return ResponseUtils.handleError(res, 'Failed to schedule cleanup', error);
        }
    };

    public executeCleanup = async (req: Request, res: Response): Promise<Response> => {
        try {
            this.requestLogger.logRequest('executeCleanup', req);

            const result = await this.cleanupScheduler.executeCleanup(req.params.processingUuid);
            return ResponseUtils.handleSuccess(res, `Deleted ${result.filesDeleted} files`, result);
        } catch (error) {
            return ResponseUtils.handleError(res, 'Failed to execute cleanup', error);
        }
    };

    public runPendingCleanups = async (req: Request, res: Response): Promise<Response> => {
        try {
            this.requestLogger.logRequest('runPendingCleanups', req);

            const summary = await this.cleanupScheduler.executePendingCleanups();
            return ResponseUtils.handleSuccess(res, `Executed ${summary.executed.length} pending cleanups`, summary);
        } catch (error) {
            return ResponseUtils.handleError(res, 'Failed to run pending cleanups', error);
        }
    };

    public getRoutes(): Router {
        const router = Router();

        router.post('/process-package', this.processPackage);
        router.post('/process-pubsub', this.processPubSub);
        router.get('/processing-status/:processingUuid', this.getProcessingStatus);
        router.post('/schedule-cleanup', this.internalAuth, this.scheduleCleanup);
        router.post('/cleanup/execute/:processingUuid', this.internalAuth, this.executeCleanup);
        router.post('/cleanup/run-pending', this.internalAuth, this.runPendingCleanups);

        return router;
    }
}
