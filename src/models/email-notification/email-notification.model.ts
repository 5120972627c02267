import { Sequelize, DataTypes, Model, Optional } from 'sequelize';
import { IEmailNotification, NotificationType, NotificationStatus } from './email-notification.interface';

interface EmailNotificationCreationAttributes extends Optional<IEmailNotification, 'id' | 'processingUuid' | 'errorMessage' | 'sentAt'> {}

export class EmailNotificationModel extends Model<IEmailNotification, EmailNotificationCreationAttributes> implements IEmailNotification {
    public id!: number;
    public processingUuid!: string | null;
    public type!: NotificationType;
    public recipient!: string;
    public subject!: string;
    public status!: NotificationStatus;
    public errorMessage!: string | null;
    public sentAt!: Date;
}

export const initEmailNotificationModel = (sequelize: Sequelize): typeof EmailNotificationModel => {
    EmailNotificationModel.init({
        id: {
            type: DataTypes.INTEGER,
            autoIncrement: true,
            primaryKey: true
        },
        processingUuid: {
            type: DataTypes.STRING(64),
            allowNull: true
        },
        type: {
            type: DataTypes.ENUM('completion', 'error', 'custom', 'test'),
            allowNull: false
        },
        recipient: {
            type: DataTypes.STRING(320),
            allowNull: false
        },
        subject: {
            type: DataTypes.STRING(512),
            allowNull: false
        },
        status: {
            type: DataTypes.ENUM('sent', 'failed'),
            allowNull: false
        },
        errorMessage: {
            type: DataTypes.TEXT,
            allowNull: true
        },
        sentAt: {
            type: DataTypes.DATE,
            allowNull: false,
            defaultValue: DataTypes.NOW
        }
    }, {
        sequelize,
        tableName: 'email_notifications',
        timestamps: false,
        indexes: [
            { fields: ['processingUuid'] },
            { fields: ['sentAt'] }
        ]
    });

    return EmailNotificationModel;
};
