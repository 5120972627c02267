import { Sequelize, Op } from 'sequelize';
import { initModels, Models } from '@/models';
import { ImagePathMap, ImageRef } from '@/models/shipment-image';
import { logger } from '@/utils';

export class ShipmentImageRepository {
    private models: Models;

    constructor(sequelize: Sequelize) {
        this.models = initModels(sequelize);
    }

    async getImagePathsByShipmentIds(shipmentIds: Array<string | number>): Promise<ImagePathMap> {
        const result: ImagePathMap = new Map();
        const ids = [...new Set(shipmentIds.map(id => String(id)))];

        if (ids.length === 0) {
            return result;
        }

        try {
            const rows = await this.models.ShipmentImage.findAll({
                where: { shipmentId: { [Op.in]: ids } },
                order: [['shipmentId', 'ASC'], ['order', 'ASC']]
            });

            for (const row of rows) {
                const ref: ImageRef = { path: row.imagePath, type: row.imageType, order: row.order };
                const existing = result.get(row.shipmentId);
                if (existing) {
                    existing.push(ref);
                } else {
                    result.set(row.shipmentId, [ref]);
                }
            }

            logger.debug('Image paths loaded', { requested: ids.length, withImages: result.size, totalImages: rows.length });
            return result;
        } catch (error) {
            logger.error('Error in getImagePathsByShipmentIds', error);
            throw error;
        }
    }
}
