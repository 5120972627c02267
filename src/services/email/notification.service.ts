import { NotificationConfig } from '@/config/email.config';
import { NotificationCounts, NotificationType } from '@/models/email-notification';
import { EmailNotificationRepository, FileProcessingRepository } from '@/repositories';
import { JsonRecord, logger, NotFoundError, roundTo, ValidationError } from '@/utils';
import {
    completionEmailSchema,
    CompletionEmailRequest,
    CustomEmailRequest,
    errorNotificationSchema,
    ErrorNotificationRequest,
    parseWithSchema
} from '@/utils/validation';
import { EmailSenderService, SendResult } from './email-sender.service';
import { escapeHtml, TemplateService } from './template.service';

export interface CompletionNotificationResult {
    success: boolean;
    processingUuid: string;
    emailsSent: number;
    databaseUpdated: boolean;
    results: SendResult[];
    completedAt: string;
}

export interface ErrorNotificationResult {
    success: boolean;
    errorType: string;
    notificationSent: boolean;
    result: SendResult;
}

export interface EmailStatistics extends NotificationCounts {
    periodDays: number;
    since: string;
    successRate: number;
}

export type PubSubEmailResult =
    | { action: 'send_completion_email'; result: CompletionNotificationResult }
    | { action: 'send_error_notification'; result: ErrorNotificationResult };

export const buildAdditionalLinks = (signedUrls: string[]): string => {
    if (signedUrls.length <= 1) {
        return '';
    }
    const items = signedUrls
        .slice(1)
        .map((url, index) => `<li><a href="${escapeHtml(url)}">Package ${index + 2}</a></li>`)
        .join('');
    return `<p>Additional packages:</p><ul>${items}</ul>`;
};

export class NotificationService {
    constructor(
        private readonly sender: EmailSenderService,
        private readonly templates: TemplateService,
        private readonly fileRepo: FileProcessingRepository,
        private readonly notificationRepo: EmailNotificationRepository,
        private readonly config: NotificationConfig,
        private readonly fallbackRecipient: string,
        private readonly serviceName: string
    ) {}

    async sendCompletionNotification(request: CompletionEmailRequest): Promise<CompletionNotificationResult> {
        const { processingUuid } = request;
        const record = await this.fileRepo.getByProcessingUuid(processingUuid);
        if (!record) {
            throw new NotFoundError(`Processing not found: ${processingUuid}`);
        }

        const signedUrls = request.signedUrls ?? (request.signedUrl ? [request.signedUrl] : []);
        const recipients = request.recipientEmail
            ? [request.recipientEmail]
            : this.config.recipients.length > 0 ? this.config.recipients : [this.fallbackRecipient];
        const subject = `Processing completed - ${processingUuid.slice(0, 8)}`;

        const data = {
            processingUuid,
            signedUrl: signedUrls[0] ?? '#',
            imagesProcessed: request.imagesProcessed ?? 0,
            fileSizeMb: request.fileSizeMb ?? 0,
            expirationHours: request.expirationHours ?? 2,
            expirationDatetime: request.expirationDatetime ?? 'N/A',
            originalFile: record.fileName,
            additionalLinks: buildAdditionalLinks(signedUrls)
        };

        const results: SendResult[] = [];
        for (const to of recipients) {
            const result = await this.sender.sendTemplated({ to, subject, templateName: 'completion', data });
            await this.recordAttempt('completion', result, processingUuid);
            results.push(result);
        }

        const emailsSent = results.filter(result => result.success).length;
        const databaseUpdated = await this.fileRepo.markCompletion(processingUuid, {
            emailSent: emailsSent > 0,
            signedUrl: signedUrls[0] ?? null,
            completionData: { ...request, signedUrls, recipients }
        });

        logger.info(`Completion notification processed: ${emailsSent}/${recipients.length} sent`, { traceId: processingUuid });

        return {
            success: emailsSent > 0,
            processingUuid,
            emailsSent,
            databaseUpdated,
            results,
            completedAt: new Date().toISOString()
        };
    }

    async sendErrorNotification(request: ErrorNotificationRequest): Promise<ErrorNotificationResult> {
        const to = this.config.adminEmail || this.fallbackRecipient;
        const details = Object.fromEntries(
            Object.entries(request.details ?? {}).map(([key, value]) => [key, typeof value === 'string' ? value : JSON.stringify(value)])
        );

        const result = await this.sender.sendTemplated({
            to,
            subject: `Processing error - ${request.errorType}`,
            templateName: 'error',
            data: {
                ...details,
                errorType: request.errorType,
                errorMessage: request.errorMessage,
                processingUuid: request.processingUuid ?? 'N/A',
                reportedAt: new Date().toISOString()
            }
        });
        await this.recordAttempt('error', result, request.processingUuid ?? null);

        return {
            success: result.success,
            errorType: request.errorType,
            notificationSent: result.success,
            result
        };
    }

    async sendCustomEmail(request: CustomEmailRequest): Promise<SendResult> {
        const template = await this.templates.getTemplateInfo(request.templateName);
        if (!template) {
            throw new NotFoundError(`Template not found: ${request.templateName}`);
        }

        const result = await this.sender.sendTemplated({
            to: request.toEmail,
            subject: request.subject,
            templateName: request.templateName,
            data: { title: request.subject, ...request.templateData }
        });
        const processingUuid = request.templateData.processingUuid;
        await this.recordAttempt('custom', result, typeof processingUuid === 'string' ? processingUuid : null);
        return result;
    }

    async sendTestEmail(toEmail: string): Promise<SendResult> {
        const result = await this.sender.sendTestEmail(toEmail, this.serviceName);
        await this.recordAttempt('test', result, null);
        return result;
    }

    async getStatistics(days: number, now: Date = new Date()): Promise<EmailStatistics> {
        const since = new Date(now.getTime() - days * 24 * 3600 * 1000);
        const counts = await this.notificationRepo.countSince(since);

        return {
            ...counts,
            periodDays: days,
            since: since.toISOString(),
            successRate: counts.total > 0 ? roundTo((counts.sent / counts.total) * 100) : 0
        };
    }

    async handlePubSubMessage(payload: JsonRecord): Promise<PubSubEmailResult> {
        const action = payload.action ?? 'send_completion_email';

        if (action === 'send_completion_email') {
            const request = parseWithSchema(completionEmailSchema, payload, 'completion email message');
            return { action: 'send_completion_email', result: await this.sendCompletionNotification(request) };
        }
        if (action === 'send_error_notification') {
            const request = parseWithSchema(errorNotificationSchema, payload, 'error notification message');
            return { action: 'send_error_notification', result: await this.sendErrorNotification(request) };
        }

        throw new ValidationError(`Unknown email action: ${String(action)}`);
    }

    private async recordAttempt(type: NotificationType, result: SendResult, processingUuid: string | null): Promise<void> {
        try {
            await this.notificationRepo.recordNotification({
                processingUuid,
                type,
                recipient: result.recipient,
                subject: result.subject,
                status: result.success ? 'sent' : 'failed',
                errorMessage: result.error
            });
        } catch (error) {
            logger.error('Could not record email notification', error, { traceId: processingUuid ?? undefined, type });
        }
    }
}
