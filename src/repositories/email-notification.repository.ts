import { Sequelize, Op } from 'sequelize';
import { initModels, Models } from '@/models';
import { IEmailNotification, NotificationCounts, NotificationStatus, NotificationType } from '@/models/email-notification';
import { logger } from '@/utils';

export interface RecordNotificationInput {
    processingUuid?: string | null;
    type: NotificationType;
    recipient: string;
    subject: string;
    status: NotificationStatus;
    errorMessage?: string | null;
}

export class EmailNotificationRepository {
    private models: Models;

    constructor(sequelize: Sequelize) {
        this.models = initModels(sequelize);
    }

    async recordNotification(input: RecordNotificationInput): Promise<IEmailNotification> {
        try {
            const row = await this.models.EmailNotification.create({
                processingUuid: input.processingUuid ?? null,
                type: input.type,
                recipient: input.recipient,
                subject: input.subject,
                status: input.status,
                errorMessage: input.errorMessage ?? null,
                sentAt: new Date()
            });

            return {
                id: row.id,
                processingUuid: row.processingUuid ?? null,
                type: row.type,
                recipient: row.recipient,
                subject: row.subject,
                status: row.status,
                errorMessage: row.errorMessage ?? null,
                sentAt: row.sentAt
            };
        } catch (error) {
            logger.error('Error in recordNotification', error);
            throw error;
        }
    }

    async countSince(since: Date): Promise<NotificationCounts> {
        try {
            const rows = await this.models.EmailNotification.findAll({
                where: { sentAt: { [Op.gte]: since } },
                attributes: ['type', 'status']
            });

            const counts: NotificationCounts = { total: 0, sent: 0, failed: 0, byType: {} };
            for (const row of rows) {
                counts.total++;
                if (row.status === 'sent') counts.sent++;
                else counts.failed++;
                counts.byType[row.type] = (counts.byType[row.type] ?? 0) + 1;
            }
            return counts;
        } catch (error) {
            logger.error('Error in countSince', error);
            throw error;
        }
    }
}
