import { Request, RequestHandler, Response, Router } from 'express';
import { NotificationService } from '@/services/email/notification.service';
import { TemplateService } from '@/services/email/template.service';
import { extractEventData, NotFoundError, RequestLogger, ResponseUtils } from '@/utils';
import {
    completionEmailSchema,
    customEmailSchema,
    errorNotificationSchema,
    parseWithSchema,
    statisticsQuerySchema,
    testEmailSchema
} from '@/utils/validation';

export class EmailController {
    constructor(
        private readonly notificationService: NotificationService,
        private readonly templateService: TemplateService,
        private readonly requestLogger: RequestLogger,
        private readonly internalAuth: RequestHandler
    ) {}

    public sendCompletionEmail = async (req: Request, res: Response): Promise<Response> => {
        try {
            this.requestLogger.logRequest('sendCompletionEmail', req);

            const request = parseWithSchema(completionEmailSchema, req.body);
            const result = await this.notificationService.sendCompletionNotification(request);

            return ResponseUtils.handleSuccess(
                res,
                result.success ? `Completion email sent to ${result.emailsSent} recipients` : 'Completion email could not be delivered',
                result
            );
        } catch (error) {
            return ResponseUtils.handleError(res, 'Failed to send completion email', error);
        }
    };

    public sendErrorNotification = async (req: Request, res: Response): Promise<Response> => {
        try {
            this.requestLogger.logRequest('sendErrorNotification', req);

            const request = parseWithSchema(errorNotificationSchema, req.body);
            const result = await this.notificationService.sendErrorNotification(request);

            return ResponseUtils.handleSuccess(res, result.notificationSent ? 'Error notification sent' : 'Error notification could not be delivered', result);
        } catch (error) {
            return ResponseUtils.handleError(res, 'Failed to send error notification', error);
        }
    };

    public sendCustomEmail = async (req: Request, res: Response): Promise<Response> => {
        try {
            this.requestLogger.logRequest('sendCustomEmail', req);

            const request = parseWithSchema(customEmailSchema, req.body);
            const result = await this.notificationService.sendCustomEmail(request);

            return ResponseUtils.handleSuccess(res, result.success ? 'Email sent' : 'Email could not be delivered', result);
        } catch (error) {
            return ResponseUtils.handleError(res, 'Failed to send custom email', error);
        }
    };

    public listTemplates = async (req: Request, res: Response): Promise<Response> => {
        try {
            this.requestLogger.logRequest('listTemplates', req);

            const templates = await this.templateService.listTemplates();
            return ResponseUtils.handleSuccess(res, `Found ${templates.length} templates`, { templates, count: templates.length });
        } catch (error) {
            return ResponseUtils.handleError(res, 'Failed to list templates', error);
        }
    };

    public getTemplate = async (req: Request, res: Response): Promise<Response> => {
        try {
            this.requestLogger.logRequest('getTemplate', req);

            const { templateName } = req.params;
            const template = await this.templateService.getTemplateInfo(templateName);
            if (!template) {
                throw new NotFoundError(`Template not found: ${templateName}`);
            }

            return ResponseUtils.handleSuccess(res, 'Template retrieved', template);
        } catch (error) {
            return ResponseUtils.handleError(res, 'Failed to get template', error);
        }
    };

    public sendTestEmail = async (req: Request, res: Response): Promise<Response> => {
        try {
            this.requestLogger.logRequest('sendTestEmail', req);

            const { toEmail } = parseWithSchema(testEmailSchema, req.body);
            const result = await this.notificationService.sendTestEmail(toEmail);

            return ResponseUtils.handleSuccess(res, result.success ? 'Test email sent' : 'Test email could not be delivered', result);
        } catch (error) {
            return ResponseUtils.handleError(res, 'Failed to send test email', error);
        }
    };

    public getStatistics = async (req: Request, res: Response): Promise<Response> => {
        try {
            this.requestLogger.logRequest('getStatistics', req);

            const { days } = parseWithSchema(statisticsQuerySchema, req.query, 'query');
            const statistics = await this.notificationService.getStatistics(days);

            return ResponseUtils.handleSuccess(res, 'Email statistics retrieved', statistics);
        } catch (error) {
            return ResponseUtils.handleError(res, 'Failed to get email statistics', error);
        }
    };

    public handlePubSub = async (req: Request, res: Response): Promise<Response> => {
        try {
            this.requestLogger.logRequest('handlePubSub', req);

            const outcome = await this.notificationService.handlePubSubMessage(extractEventData(req.body));
            return ResponseUtils.handleSuccess(res, `Handled ${outcome.action}`, outcome.result);
        } catch (error) {
            return ResponseUtils.handleError(res, 'Failed to handle email message', error);
        }
    };

    public getRoutes(): Router {
        const router = Router();

        router.post('/send-completion-email', this.sendCompletionEmail);
        router.post('/send-error-notification', this.sendErrorNotification);
        router.post('/send-custom-email', this.internalAuth, this.sendCustomEmail);
        router.get('/templates', this.listTemplates);
        router.get('/templates/:templateName', this.getTemplate);
        router.post('/test-email', this.internalAuth, this.sendTestEmail);
        router.get('/statistics', this.getStatistics);
        router.post('/pubsub-handler', this.handlePubSub);

        return router;
    }
}
