import { Sequelize, DataTypes, Model, Optional } from 'sequelize';
import { IShipmentImage } from './shipment-image.interface';

interface ShipmentImageCreationAttributes extends Optional<IShipmentImage, 'id' | 'imageType' | 'order' | 'createdAt'> {}

export class ShipmentImageModel extends Model<IShipmentImage, ShipmentImageCreationAttributes> implements IShipmentImage {
    public id!: number;
    public shipmentId!: string;
    public imagePath!: string;
    public imageType!: string;
    public order!: number;
    public createdAt!: Date;
}

export const initShipmentImageModel = (sequelize: Sequelize): typeof ShipmentImageModel => {
    ShipmentImageModel.init({
        id: {
            type: DataTypes.INTEGER,
            autoIncrement: true,
            primaryKey: true
        },
        shipmentId: {
            type: DataTypes.STRING(128),
            allowNull: false
        },
        imagePath: {
            type: DataTypes.TEXT,
            allowNull: false
        },
        imageType: {
            type: DataTypes.STRING(32),
            allowNull: false,
            defaultValue: 'photo'
        },
        order: {
            type: DataTypes.INTEGER,
            allowNull: false,
            defaultValue: 0
        },
        createdAt: {
            type: DataTypes.DATE,
            allowNull: false,
            defaultValue: DataTypes.NOW
        }
    }, {
        sequelize,
        tableName: 'shipment_images',
        timestamps: true,
        updatedAt: false,
        indexes: [
            { fields: ['shipmentId'] },
            { fields: ['shipmentId', 'order'] }
        ]
    });

    return ShipmentImageModel;
};
