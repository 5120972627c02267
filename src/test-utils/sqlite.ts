import { Sequelize } from 'sequelize';
import { initModels } from '@/models';
import { CleanupTaskModel } from '@/models/cleanup-task';

export const createTestDatabase = async (): Promise<Sequelize> => {
    const sequelize = new Sequelize('sqlite::memory:', { logging: false });
    initModels(sequelize);
    await sequelize.sync({ force: true });
    return sequelize;
};

export const seedShipmentImage = async (
    sequelize: Sequelize,
    shipmentId: string,
    imagePath: string,
    imageType: string = 'photo',
    order: number = 0
): Promise<void> => {
    await initModels(sequelize).ShipmentImage.create({ shipmentId, imagePath, imageType, order });
};

export const findPendingCleanups = (sequelize: Sequelize, processingUuid: string): Promise<CleanupTaskModel[]> =>
    initModels(sequelize).CleanupTask.findAll({
        where: { processingUuid, status: 'pending' },
        order: [['scheduledFor', 'ASC']]
    });
