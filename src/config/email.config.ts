import path from 'path';

const splitList = (value: string | undefined): string[] =>
    (value || '').split(',').map(item => item.trim()).filter(Boolean);

export interface SmtpConfig {
    host: string;
    port: number;
    secure: boolean;
    user: string;
    password: string;
    fromEmail: string;
    fromName: string;
}

export interface NotificationConfig {
    recipients: string[];
    adminEmail: string;
    templatesDir: string;
}

const smtpPort = parseInt(process.env.SMTP_PORT || '587', 10);

export const smtpConfig: SmtpConfig = {
    host: process.env.SMTP_HOST || 'smtp.gmail.com',
    port: smtpPort,
    secure: process.env.SMTP_SECURE ? process.env.SMTP_SECURE === 'true' : smtpPort === 465,
    user: process.env.SMTP_USER || '',
    password: process.env.SMTP_PASSWORD || '',
    fromEmail: process.env.FROM_EMAIL || 'noreply@shipments.local',
    fromName: process.env.FROM_NAME || 'Shipments Processing'
};

export const notificationConfig: NotificationConfig = {
    recipients: splitList(process.env.NOTIFICATION_RECIPIENTS),
    adminEmail: process.env.ADMIN_EMAIL || '',
    templatesDir: process.env.EMAIL_TEMPLATES_DIR || path.resolve(process.cwd(), 'templates')
};
