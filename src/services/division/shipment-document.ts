import {
    ShipmentDocument,
    ShipmentId,
    ShipmentListKey,
    ShipmentRecord,
    SHIPMENT_LIST_KEYS
} from '@/models/shipment';
import { isRecord, ValidationError } from '@/utils';

export interface ShipmentList {
    key: ShipmentListKey;
    shipments: ShipmentRecord[];
}

export const findShipmentListKey = (document: ShipmentDocument): ShipmentListKey | null =>
    SHIPMENT_LIST_KEYS.find(key => key in document) ?? null;

/**
 * Returns the shipment list of a document that already passed validation.
 */
export const getShipmentList = (document: unknown): ShipmentList => {
    if (!isRecord(document)) {
        throw new ValidationError('Shipment document must be a JSON object');
    }

    const key = findShipmentListKey(document);
    const list = key ? document[key] : undefined;
    if (!key || !Array.isArray(list)) {
        throw new ValidationError('Shipment document has no shipment list');
    }

    return { key, shipments: list.filter(isRecord) };
};

export const isValidShipmentId = (value: unknown): value is ShipmentId => {
    if (typeof value === 'string') {
        return value.trim().length > 0;
    }
    return typeof value === 'number' && Number.isFinite(value);
};

export const getShipmentId = (shipment: ShipmentRecord): ShipmentId | null => {
    const id = shipment.id;
    return isValidShipmentId(id) ? id : null;
};
