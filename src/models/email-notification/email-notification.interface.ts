export type NotificationType = 'completion' | 'error' | 'custom' | 'test';
export type NotificationStatus = 'sent' | 'failed';

export interface IEmailNotification {
    id: number;
    processingUuid: string | null;
    type: NotificationType;
    recipient: string;
    subject: string;
    status: NotificationStatus;
    errorMessage: string | null;
    sentAt: Date;
}

export interface NotificationCounts {
    total: number;
    sent: number;
    failed: number;
    byType: Record<string, number>;
}
