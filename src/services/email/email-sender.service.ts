import * as nodemailer from 'nodemailer';
import Mail from 'nodemailer/lib/mailer';
import { SmtpConfig } from '@/config/email.config';
import { getErrorMessage, logger } from '@/utils';
import { TemplateData, TemplateService } from './template.service';

export interface MailTransport {
    sendMail(options: Mail.Options): Promise<{ messageId?: string }>;
    verify(): Promise<boolean>;
}

export interface SendResult {
    success: boolean;
    recipient: string;
    subject: string;
    messageId: string | null;
    error: string | null;
    sentAt: string;
}

export interface TemplatedEmail {
    to: string;
    subject: string;
    templateName: string;
    data: TemplateData;
}

export const createSmtpTransport = (config: SmtpConfig): MailTransport =>
    nodemailer.createTransport({
        host: config.host,
        port: config.port,
        secure: config.secure,
        requireTLS: !config.secure,
        ...(config.user && config.password ? { auth: { user: config.user, pass: config.password } } : {})
    });

export class EmailSenderService {
    constructor(
        private readonly config: SmtpConfig,
        private readonly templates: TemplateService,
        private readonly transport: MailTransport = createSmtpTransport(config)
    ) {}

    async sendTemplated(email: TemplatedEmail): Promise<SendResult> {
        const sentAt = new Date().toISOString();
        try {
            const rendered = await this.templates.render(email.templateName, email.data);
            const info = await this.transport.sendMail({
                from: { name: this.config.fromName, address: this.config.fromEmail },
                to: email.to,
                subject: email.subject,
                html: rendered.html,
                text: rendered.text
            });

            logger.info(`Email sent to ${email.to}`, { template: email.templateName, messageId: info.messageId });
            return {
                success: true,
                recipient: email.to,
                subject: email.subject,
                messageId: info.messageId ?? null,
                error: null,
                sentAt
            };
        } catch (error) {
            logger.error(`Email to ${email.to} failed`, error, { template: email.templateName });
            return {
                success: false,
                recipient: email.to,
                subject: email.subject,
                messageId: null,
                error: getErrorMessage(error),
                sentAt
            };
        }
    }

    sendTestEmail(to: string, serviceName: string): Promise<SendResult> {
        return this.sendTemplated({
            to,
            subject: 'Test email - shipments processing',
            templateName: 'test',
            data: { serviceName, smtpHost: this.config.host, sentAt: new Date().toISOString() }
        });
    }

    async checkConnectivity(): Promise<string> {
        try {
            await this.transport.verify();
            return 'connected';
        } catch (error) {
            return `error: ${getErrorMessage(error)}`;
        }
    }
}
