import { Sequelize, DataTypes, Model, Optional } from 'sequelize';
import { IFileProcessing, FileProcessingStatus } from './file-processing.interface';

interface FileProcessingCreationAttributes extends Optional<IFileProcessing,
    'id' | 'status' | 'startedAt' | 'finishedAt' | 'result' | 'errorMessage' | 'metadata'
    | 'emailSent' | 'signedUrl' | 'completionData' | 'createdAt' | 'updatedAt'> {}

export class FileProcessingModel extends Model<IFileProcessing, FileProcessingCreationAttributes> implements IFileProcessing {
    public id!: number;
    public processingUuid!: string;
    public fileName!: string;
    public totalShipments!: number;
    public totalPackages!: number;
    public status!: FileProcessingStatus;
    public startedAt!: Date;
    public finishedAt!: Date | null;
    public result!: Record<string, unknown> | null;
    public errorMessage!: string | null;
    public metadata!: Record<string, unknown>;
    public emailSent!: boolean;
    public signedUrl!: string | null;
    public completionData!: Record<string, unknown> | null;
    public createdAt!: Date;
    public updatedAt!: Date;
}

export const initFileProcessingModel = (sequelize: Sequelize): typeof FileProcessingModel => {
    FileProcessingModel.init({
        id: {
            type: DataTypes.INTEGER,
            autoIncrement: true,
            primaryKey: true
        },
        processingUuid: {
            type: DataTypes.STRING(64),
            allowNull: false,
            unique: true
        },
        fileName: {
            type: DataTypes.STRING(512),
            allowNull: false
        },
        totalShipments: {
            type: DataTypes.INTEGER,
            allowNull: false,
            defaultValue: 0
        },
        totalPackages: {
            type: DataTypes.INTEGER,
            allowNull: false,
            defaultValue: 0
        },
        status: {
            type: DataTypes.ENUM('processing', 'completed', 'failed'),
            allowNull: false,
            defaultValue: 'processing'
        },
        startedAt: {
            type: DataTypes.DATE,
            allowNull: false,
            defaultValue: DataTypes.NOW
        },
        finishedAt: {
            type: DataTypes.DATE,
            allowNull: true
        },
        result: {
            type: DataTypes.JSON,
            allowNull: true
        },
        errorMessage: {
            type: DataTypes.TEXT,
            allowNull: true
        },
        metadata: {
            type: DataTypes.JSON,
            allowNull: false,
            defaultValue: {}
        },
        emailSent: {
            type: DataTypes.BOOLEAN,
            allowNull: false,
            defaultValue: false
        },
        signedUrl: {
            type: DataTypes.TEXT,
            allowNull: true
        },
        completionData: {
            type: DataTypes.JSON,
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
        tableName: 'file_processing',
        timestamps: true,
        indexes: [
            { fields: ['status'] },
            { fields: ['createdAt'] }
        ]
    });

    return FileProcessingModel;
};
