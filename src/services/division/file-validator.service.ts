import { ProcessingConfig } from '@/config/pipeline.config';
import { FileStatistics, FileValidationResult, ShipmentRecord } from '@/models/shipment';
import { StorageGateway } from '@/models/storage';
import { isRecord, logger, NotFoundError, toGcsUri } from '@/utils';
import { findShipmentListKey, getShipmentId, getShipmentList } from './shipment-document';

const MAX_REPORTED_ERRORS = 10;

export class FileValidatorService {
    constructor(
        private readonly storage: StorageGateway,
        private readonly processing: Pick<ProcessingConfig, 'maxShipmentsPerFile'>
    ) {}

    async validateFile(bucket: string, name: string, traceId?: string): Promise<FileValidationResult> {
        if (!(await this.storage.exists(bucket, name))) {
            return { valid: false, errors: ['File does not exist or is not accessible'] };
        }

        let document: unknown;
        try {
            document = await this.storage.readJson(bucket, name);
        } catch (error) {
            return { valid: false, errors: [`File is not valid JSON: ${error instanceof Error ? error.message : 'parse error'}`] };
        }

        const result = this.validateDocument(document);
        if (result.valid) {
            logger.info(`File structure is valid: ${name}`, { traceId });
        } else {
            logger.warn(`File structure is invalid: ${name}`, { traceId, errors: result.errors });
        }
        return result;
    }

    validateDocument(document: unknown): FileValidationResult {
        if (!isRecord(document)) {
            return { valid: false, errors: ['Root of the file must be a JSON object'] };
        }

        const key = findShipmentListKey(document);
        if (!key) {
            return { valid: false, errors: ["Missing required field 'shipments'"] };
        }

        const shipments = document[key];
        if (!Array.isArray(shipments)) {
            return { valid: false, errors: [`Field '${key}' must be an array`] };
        }
        if (shipments.length === 0) {
            return { valid: false, errors: [`Field '${key}' must not be empty`] };
        }

        const contentErrors = this.validateShipments(shipments);
        if (contentErrors.length > 0) {
            const reported = contentErrors.slice(0, MAX_REPORTED_ERRORS);
            if (contentErrors.length > MAX_REPORTED_ERRORS) {
                reported.push(`...and ${contentErrors.length - MAX_REPORTED_ERRORS} more errors`);
            }
            return { valid: false, errors: reported };
        }

        const limit = this.processing.maxShipmentsPerFile * 100;
        if (shipments.length > limit) {
            return { valid: false, errors: [`File has ${shipments.length} shipments, the limit is ${limit}`] };
        }

        if ('metadata' in document && !isRecord(document.metadata)) {
            return { valid: false, errors: ["Field 'metadata' must be an object"] };
        }

        return { valid: true, errors: [] };
    }

    private validateShipments(shipments: unknown[]): string[] {
        const errors: string[] = [];
        const seen = new Set<string>();

        shipments.forEach((shipment, index) => {
            if (!isRecord(shipment)) {
                errors.push(`Shipment #${index}: must be an object`);
                return;
            }
            if (!('id' in shipment)) {
                errors.push(`Shipment #${index}: missing required field 'id'`);
                return;
            }

            const id = getShipmentId(shipment);
            if (id === null) {
                errors.push(`Shipment #${index}: 'id' must be a non-empty string or a number`);
                return;
            }

            const key = String(id);
            if (seen.has(key)) {
                errors.push(`Shipment #${index}: duplicate id '${key}'`);
            } else {
                seen.add(key);
            }
        });

        return errors;
    }

    async getFileStatistics(bucket: string, name: string): Promise<FileStatistics> {
        if (!(await this.storage.exists(bucket, name))) {
            throw new NotFoundError(`File not found: ${toGcsUri(bucket, name)}`);
        }
        const document = await this.storage.readJson(bucket, name);
        return this.computeStatistics(document);
    }

    computeStatistics(document: unknown): FileStatistics {
        const { shipments } = getShipmentList(document);
        const max = this.processing.maxShipmentsPerFile;
        const commonFields = new Set<string>();
        shipments.slice(0, 10).forEach(shipment => Object.keys(shipment).forEach(field => commonFields.add(field)));

        const first = shipments[0];
        const last = shipments[shipments.length - 1];

        return {
            totalShipments: shipments.length,
            estimatedPackages: Math.max(1, Math.ceil(shipments.length / max)),
            uniqueIds: new Set(shipments.map(shipment => String(shipment.id ?? ''))).size,
            firstId: first ? getShipmentId(first) : null,
            lastId: last ? getShipmentId(last) : null,
            commonFields: [...commonFields],
            hasMetadata: isRecord(document) && 'metadata' in document,
            validationScore: this.calculateValidationScore(shipments)
        };
    }

    /**
     * 30 for a readable structure, 20 for a non-empty list, up to 25 for id
     * uniqueness and up to 25 for filled fields in the first five shipments.
     */
    calculateValidationScore(shipments: ShipmentRecord[]): number {
        let score = 30;
        if (shipments.length === 0) {
            return score;
        }
        score += 20;

        const uniqueIds = new Set(shipments.map(shipment => String(shipment.id ?? ''))).size;
        score += uniqueIds === shipments.length ? 25 : Math.floor((uniqueIds / shipments.length) * 25);

        let filled = 0;
        let total = 0;
        for (const shipment of shipments.slice(0, 5)) {
            for (const value of Object.values(shipment)) {
                total++;
                if (value !== null && value !== undefined && String(value).trim() !== '') {
                    filled++;
                }
            }
        }
        if (total > 0) {
            score += Math.floor((filled / total) * 25);
        }

        return Math.min(100, Math.max(0, score));
    }
}
