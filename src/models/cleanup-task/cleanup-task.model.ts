import { Sequelize, DataTypes, Model, Optional } from 'sequelize';
import { ICleanupTask, CleanupStatus } from './cleanup-task.interface';

interface CleanupTaskCreationAttributes extends Optional<ICleanupTask,
    'id' | 'status' | 'taskName' | 'result' | 'executedAt' | 'createdAt' | 'updatedAt'> {}

export class CleanupTaskModel extends Model<ICleanupTask, CleanupTaskCreationAttributes> implements ICleanupTask {
    public id!: number;
    public processingUuid!: string;
    public scheduledFor!: Date;
    public cleanupAfterHours!: number;
    public status!: CleanupStatus;
    public taskName!: string | null;
    public result!: Record<string, unknown> | null;
    public executedAt!: Date | null;
    public createdAt!: Date;
    public updatedAt!: Date;
}

export const initCleanupTaskModel = (sequelize: Sequelize): typeof CleanupTaskModel => {
    CleanupTaskModel.init({
        id: {
            type: DataTypes.INTEGER,
            autoIncrement: true,
            primaryKey: true
        },
        processingUuid: {
            type: DataTypes.STRING(64),
            allowNull: false
        },
        scheduledFor: {
            type: DataTypes.DATE,
            allowNull: false
        },
        cleanupAfterHours: {
            type: DataTypes.FLOAT,
            allowNull: false
        },
        status: {
            type: DataTypes.ENUM('pending', 'completed', 'failed'),
            allowNull: false,
            defaultValue: 'pending'
        },
        taskName: {
            type: DataTypes.TEXT,
            allowNull: true
        },
        result: {
            type: DataTypes.JSON,
            allowNull: true
        },
        executedAt: {
            type: DataTypes.DATE,
            allowNull: true
        },
        createdAt: {
            type: DataTypes.DATE,
            allowNull: false,
            defaultValue: DataTypes.NOW
        },
        updatedAt: {
            type: DataTypes.DATE,
            allowNull: false,
            defaultValue: DataTypes.NOW
        }
    }, {
        sequelize,
        tableName: 'cleanup_tasks',
        timestamps: true,
        indexes: [
            { fields: ['processingUuid'] },
            { fields: ['status', 'scheduledFor'] }
        ]
    });

    return CleanupTaskModel;
};
