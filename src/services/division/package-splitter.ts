import { v5 as uuidv5 } from 'uuid';
import { ImagePathMap } from '@/models/shipment-image';
import {
    EnrichedShipment,
    ImageCoverage,
    ImageStats,
    PackageMetadata,
    ShipmentDocument,
    ShipmentPackage,
    UrlValidationResult,
    ValidationStats
} from '@/models/shipment';
import { roundTo } from '@/utils';
import { getShipmentId, getShipmentList } from './shipment-document';

export interface SplitOptions {
    maxPerPackage: number;
    processingUuid: string;
    originalFile: string;
    imagePaths: ImagePathMap;
    serviceOrigin: string;
    serviceVersion: string;
    imageValidation?: UrlValidationResult[];
    getValidationStats?: (results: UrlValidationResult[]) => ValidationStats;
    now?: Date;
}

export const packageUuidFor = (processingUuid: string, packageNumber: number): string =>
    uuidv5(`${processingUuid}-package-${packageNumber}`, uuidv5.DNS);

export const packageFileName = (originalFile: string, processingUuid: string, packageNumber: number, totalPackages: number): string => {
    const base = originalFile.endsWith('.json') ? originalFile.slice(0, -'.json'.length) : originalFile;
    return `${base}_${processingUuid}_${packageNumber}_of_${totalPackages}.json`;
};

export const countPackages = (totalShipments: number, maxPerPackage: number): number =>
    totalShipments === 0 ? 0 : Math.ceil(totalShipments / maxPerPackage);

export const computeImageStats = (shipments: EnrichedShipment[]): ImageStats => {
    const totalImages = shipments.reduce((sum, shipment) => sum + shipment.images.length, 0);
    const shipmentsWithImages = shipments.filter(shipment => shipment.images.length > 0).length;

    return {
        totalImages,
        shipmentsWithImages,
        shipmentsWithoutImages: shipments.length - shipmentsWithImages,
        coveragePercentage: shipments.length > 0 ? roundTo((shipmentsWithImages / shipments.length) * 100) : 0
    };
};

export const computeImageCoverage = (totalShipments: number, imagePaths: ImagePathMap): ImageCoverage => {
    let totalImages = 0;
    for (const images of imagePaths.values()) {
        totalImages += images.length;
    }
    const withImages = Math.min(totalShipments, [...imagePaths.values()].filter(images => images.length > 0).length);

    return {
        totalImages,
        shipmentsWithImages: withImages,
        shipmentsWithoutImages: totalShipments - withImages,
        coveragePercentage: totalShipments > 0 ? roundTo((withImages / totalShipments) * 100) : 0,
        avgImagesPerShipment: totalShipments > 0 ? roundTo(totalImages / totalShipments) : 0
    };
};

/**
 * Splits a shipment document into packages of at most `maxPerPackage`
 * shipments. Every package is a deep copy of the source document whose list
 * holds one chunk, in source order, with image references attached.
 */
export const splitIntoPackages = (document: ShipmentDocument, options: SplitOptions): ShipmentPackage[] => {
    if (!Number.isInteger(options.maxPerPackage) || options.maxPerPackage <= 0) {
        throw new Error('maxPerPackage must be a positive integer');
    }

    const { key, shipments } = getShipmentList(document);
    const { [key]: _shipmentList, ...sharedFields } = document;
    const totalPackages = countPackages(shipments.length, options.maxPerPackage);
    const createdAt = (options.now ?? new Date()).toISOString();
    const packages: ShipmentPackage[] = [];

    for (let index = 0; index < totalPackages; index++) {
        const start = index * options.maxPerPackage;
        const chunk = shipments.slice(start, start + options.maxPerPackage);
        const packageNumber = index + 1;

        const enriched: EnrichedShipment[] = chunk.map(shipment => {
            const id = getShipmentId(shipment);
            const images = id === null ? [] : options.imagePaths.get(String(id)) ?? [];
            return { ...structuredClone(shipment), images: images.map(image => ({ ...image })) };
        });

        const imageStats = computeImageStats(enriched);
        const first = chunk[0];
        const last = chunk[chunk.length - 1];

        const metadata: PackageMetadata = {
            processingUuid: options.processingUuid,
            packageUuid: packageUuidFor(options.processingUuid, packageNumber),
            packageNumber,
            totalPackages,
            packageLabel: `${packageNumber}/${totalPackages}`,
            originalFile: options.originalFile,
            originalTotalShipments: shipments.length,
            packageShipmentsCount: chunk.length,
            packageImagesCount: imageStats.totalImages,
            createdAt,
            serviceOrigin: options.serviceOrigin,
            serviceVersion: options.serviceVersion,
            shipmentsRange: {
                start: first ? getShipmentId(first) : null,
                end: last ? getShipmentId(last) : null
            }
        };

        const packageDocument: ShipmentDocument = {
            ...structuredClone(sharedFields),
            [key]: enriched,
            metadata,
            imageStats
        };

        if (options.imageValidation) {
            const results = options.imageValidation.slice(start, start + options.maxPerPackage);
            packageDocument.imageValidation = {
                results,
                ...(options.getValidationStats ? { stats: options.getValidationStats(results) } : {})
            };
        }

        packages.push({
            fileName: packageFileName(options.originalFile, options.processingUuid, packageNumber, totalPackages),
            metadata,
            imageStats,
            document: packageDocument
        });
    }

    return packages;
};
