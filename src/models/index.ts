import { Sequelize } from 'sequelize';
import { initFileProcessingModel } from './file-processing';
import { initShipmentImageModel } from './shipment-image';
import { initImageProcessingModel } from './image-processing';
import { initCleanupTaskModel } from './cleanup-task';
import { initEmailNotificationModel } from './email-notification';

export const initModels = (sequelize: Sequelize) => {
    const FileProcessing = initFileProcessingModel(sequelize);
    const ShipmentImage = initShipmentImageModel(sequelize);
    const ImageProcessing = initImageProcessingModel(sequelize);
    const CleanupTask = initCleanupTaskModel(sequelize);
    const EmailNotification = initEmailNotificationModel(sequelize);

    return { FileProcessing, ShipmentImage, ImageProcessing, CleanupTask, EmailNotification };
};

export type Models = ReturnType<typeof initModels>;
