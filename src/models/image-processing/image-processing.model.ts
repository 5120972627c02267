import { Sequelize, DataTypes, Model, Optional } from 'sequelize';
import { IImageProcessing, ImageProcessingStatus } from './image-processing.interface';

interface ImageProcessingCreationAttributes extends Optional<IImageProcessing,
    'id' | 'status' | 'imagesProcessed' | 'imagesFailed' | 'zipObjectName' | 'signedUrl' | 'expiresAt'
    | 'result' | 'errorMessage' | 'startedAt' | 'finishedAt' | 'createdAt' | 'updatedAt'> {}

export class ImageProcessingModel extends Model<IImageProcessing, ImageProcessingCreationAttributes> implements IImageProcessing {
    public id!: number;
    public processingUuid!: string;
    public packageName!: string;
    public packageUri!: string;
    public status!: ImageProcessingStatus;
    public imagesProcessed!: number;
    public imagesFailed!: number;
    public zipObjectName!: string | null;
    public signedUrl!: string | null;
    public expiresAt!: Date | null;
    public result!: Record<string, unknown> | null;
    public errorMessage!: string | null;
    public startedAt!: Date;
    public finishedAt!: Date | null;
    public createdAt!: Date;
    public updatedAt!: Date;
}

export const initImageProcessingModel = (sequelize: Sequelize): typeof ImageProcessingModel => {
    ImageProcessingModel.init({
        id: {
            type: DataTypes.INTEGER,
            autoIncrement: true,
            primaryKey: true
        },
        processingUuid: {
            type: DataTypes.STRING(64),
            allowNull: false
        },
        packageName: {
            type: DataTypes.STRING(512),
            allowNull: false
        },
        packageUri: {
            type: DataTypes.TEXT,
            allowNull: false
        },
        status: {
            type: DataTypes.ENUM('in_progress', 'completed', 'failed'),
            allowNull: false,
            defaultValue: 'in_progress'
        },
        imagesProcessed: {
            type: DataTypes.INTEGER,
            allowNull: false,
            defaultValue: 0
        },
        imagesFailed: {
            type: DataTypes.INTEGER,
            allowNull: false,
            defaultValue: 0
        },
        zipObjectName: {
            type: DataTypes.STRING(512),
            allowNull: true
        },
        signedUrl: {
            type: DataTypes.TEXT,
            allowNull: true
        },
        expiresAt: {
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
        startedAt: {
            type: DataTypes.DATE,
            allowNull: false,
            defaultValue: DataTypes.NOW
        },
        finishedAt: {
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
        tableName: 'image_processing',
        timestamps: true,
        indexes: [
            { fields: ['processingUuid'] },
            { fields: ['processingUuid', 'packageName'] }
        ]
    });

    return ImageProcessingModel;
};
