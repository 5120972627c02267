import { ImageRef } from '../shipment-image';

export type ShipmentId = string | number;

export type ShipmentListKey = 'shipments' | 'envios';

export const SHIPMENT_LIST_KEYS: readonly ShipmentListKey[] = ['shipments', 'envios'];

export type ShipmentRecord = Record<string, unknown>;

export type ShipmentDocument = Record<string, unknown>;

export interface EnrichedShipment extends ShipmentRecord {
    images: ImageRef[];
}

export interface ShipmentsRange {
    start: ShipmentId | null;
    end: ShipmentId | null;
}

export interface PackageMetadata {
    processingUuid: string;
    packageUuid: string;
    packageNumber: number;
    totalPackages: number;
    packageLabel: string;
    originalFile: string;
    originalTotalShipments: number;
    packageShipmentsCount: number;
    packageImagesCount: number;
    createdAt: string;
    serviceOrigin: string;
    serviceVersion: string;
    shipmentsRange: ShipmentsRange;
}

export interface ImageStats {
    totalImages: number;
    shipmentsWithImages: number;
    shipmentsWithoutImages: number;
    coveragePercentage: number;
}

export interface ShipmentPackage {
    fileName: string;
    metadata: PackageMetadata;
    imageStats: ImageStats;
    document: ShipmentDocument;
}

export interface FileValidationResult {
    valid: boolean;
    errors: string[];
}

export interface FileStatistics {
    totalShipments: number;
    estimatedPackages: number;
    uniqueIds: number;
    firstId: ShipmentId | null;
    lastId: ShipmentId | null;
    commonFields: string[];
    hasMetadata: boolean;
    validationScore: number;
}

export interface UrlValidationResult {
    index?: number;
    url: string | null;
    valid: boolean;
    error: string | null;
    statusCode: number | null;
    contentType: string | null;
    contentLength: number | null;
}

export interface ValidationStats {
    total: number;
    valid: number;
    invalid: number;
    successPercentage: number;
    errorsByType: Record<string, number>;
    statusCodes: Record<string, number>;
    contentTypes: Record<string, number>;
    recommendations: string[];
}

export interface DivisionResult {
    status: 'success';
    processingUuid: string;
    originalFile: string;
    totalShipments: number;
    packagesCreated: number;
    filesMoved: string[];
    databaseRecordId: number;
    imageCoverage: ImageCoverage;
    urlValidation: ValidationStats | null;
    workflowMessageId: string | null;
    timestamp: string;
}

export interface ImageCoverage {
    totalImages: number;
    shipmentsWithImages: number;
    shipmentsWithoutImages: number;
    coveragePercentage: number;
    avgImagesPerShipment: number;
}
