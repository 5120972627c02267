import { validate as isUuid } from 'uuid';
import { ImagePathMap } from '@/models/shipment-image';
import {
    computeImageCoverage,
    countPackages,
    packageFileName,
    packageUuidFor,
    splitIntoPackages,
    SplitOptions
} from '../package-splitter';

const PROCESSING_UUID = '0b4c9e62-3f1d-4c55-9d0e-3a1f2b7c8d90';
const NOW = new Date('2024-05-01T10:00:00.000Z');

const buildOptions = (overrides: Partial<SplitOptions> = {}): SplitOptions => ({
    maxPerPackage: 2,
    processingUuid: PROCESSING_UUID,
    originalFile: 'orders.json',
    imagePaths: new Map(),
    serviceOrigin: 'division-service',
    serviceVersion: '2.0.0',
    now: NOW,
    ...overrides
});

describe('package splitter helpers', () => {
    it('counts packages', () => {
        expect(countPackages(0, 100)).toBe(0);
        expect(countPackages(100, 100)).toBe(1);
        expect(countPackages(101, 100)).toBe(2);
    });

    it('names packages after the source file', () => {
        expect(packageFileName('orders.json', 'u1', 2, 3)).toBe('orders_u1_2_of_3.json');
        expect(packageFileName('export', 'u1', 1, 1)).toBe('export_u1_1_of_1.json');
    });

    it('derives stable package uuids', () => {
        const first = packageUuidFor(PROCESSING_UUID, 1);

        expect(isUuid(first)).toBe(true);
        expect(packageUuidFor(PROCESSING_UUID, 1)).toBe(first);
        expect(packageUuidFor(PROCESSING_UUID, 2)).not.toBe(first);
    });

    it('computes file level image coverage', () => {
        const imagePaths: ImagePathMap = new Map([
            ['1', [{ path: 'a.jpg', type: 'front', order: 0 }, { path: 'b.jpg', type: 'back', order: 1 }]],
            ['3', [{ path: 'c.jpg', type: 'front', order: 0 }]]
        ]);

        expect(computeImageCoverage(4, imagePaths)).toEqual({
            totalImages: 3,
            shipmentsWithImages: 2,
            shipmentsWithoutImages: 2,
            coveragePercentage: 50,
            avgImagesPerShipment: 0.75
        });
    });
});

describe('splitIntoPackages', () => {
    const document = {
        exportedBy: 'erp',
        settings: { region: 'north' },
        shipments: [{ id: 1 }, { id: 2 }, { id: 3 }, { id: 4 }, { id: 5 }]
    };

    it('covers every shipment once and in order', () => {
        const packages = splitIntoPackages(document, buildOptions());
        const ids = packages.flatMap(pkg => {
            const list = pkg.document.shipments;
            return Array.isArray(list) ? list.map(shipment => shipment.id) : [];
        });

        expect(packages).toHaveLength(3);
        expect(ids).toEqual([1, 2, 3, 4, 5]);
        expect(packages.map(pkg => pkg.metadata.packageShipmentsCount)).toEqual([2, 2, 1]);
    });

    it('labels packages and records their range', () => {
        const packages = splitIntoPackages(document, buildOptions());
        const last = packages[2];

        expect(packages.map(pkg => pkg.metadata.packageLabel)).toEqual(['1/3', '2/3', '3/3']);
        expect(packages.map(pkg => pkg.fileName)).toEqual([
            `orders_${PROCESSING_UUID}_1_of_3.json`,
            `orders_${PROCESSING_UUID}_2_of_3.json`,
            `orders_${PROCESSING_UUID}_3_of_3.json`
        ]);
        expect(last.metadata).toEqual({
            processingUuid: PROCESSING_UUID,
            packageUuid: packageUuidFor(PROCESSING_UUID, 3),
            packageNumber: 3,
            totalPackages: 3,
            packageLabel: '3/3',
            originalFile: 'orders.json',
            originalTotalShipments: 5,
            packageShipmentsCount: 1,
            packageImagesCount: 0,
            createdAt: '2024-05-01T10:00:00.000Z',
            serviceOrigin: 'division-service',
            serviceVersion: '2.0.0',
            shipmentsRange: { start: 5, end: 5 }
        });
    });

    it('copies shared fields without aliasing the source', () => {
        const packages = splitIntoPackages(document, buildOptions());
        const settings = packages[0].document.settings;

        expect(packages[0].document.exportedBy).toBe('erp');
        expect(settings).toEqual({ region: 'north' });
        expect(settings).not.toBe(document.settings);
        expect(packages[0].document.shipments).not.toBe(document.shipments);
    });

    it('attaches image references by shipment id', () => {
        const imagePaths: ImagePathMap = new Map([
            ['2', [{ path: 'img/2-front.jpg', type: 'front', order: 0 }]]
        ]);
        const [first] = splitIntoPackages(document, buildOptions({ imagePaths }));

        expect(first.document.shipments).toEqual([
            { id: 1, images: [] },
            { id: 2, images: [{ path: 'img/2-front.jpg', type: 'front', order: 0 }] }
        ]);
        expect(first.imageStats).toEqual({
            totalImages: 1,
            shipmentsWithImages: 1,
            shipmentsWithoutImages: 1,
            coveragePercentage: 50
        });
    });

    it('keeps the envios key of the source', () => {
        const [only] = splitIntoPackages({ envios: [{ id: 'E-1' }] }, buildOptions());

        expect(only.document.envios).toEqual([{ id: 'E-1', images: [] }]);
        expect(only.document.shipments).toBeUndefined();
    });

    it('slices url validation results per package', () => {
        const imageValidation = [0, 1, 2, 3, 4].map(index => ({
            index,
            url: `https://img.test/${index}.jpg`,
            valid: index !== 3,
            error: index === 3 ? 'Invalid status code: 404' : null,
            statusCode: index === 3 ? 404 : 200,
            contentType: 'image/jpeg',
            contentLength: null
        }));
        const getValidationStats = jest.fn(() => ({
            total: 0, valid: 0, invalid: 0, successPercentage: 0,
            errorsByType: {}, statusCodes: {}, contentTypes: {}, recommendations: []
        }));

        const packages = splitIntoPackages(document, buildOptions({ imageValidation, getValidationStats }));

        expect(getValidationStats).toHaveBeenCalledTimes(3);
        expect(getValidationStats.mock.calls[1]).toEqual([imageValidation.slice(2, 4)]);
        expect(packages[2].document.imageValidation).toEqual({
            results: [imageValidation[4]],
            stats: getValidationStats.mock.results[2].value
        });
    });

    it('rejects a non positive package size', () => {
        expect(() => splitIntoPackages(document, buildOptions({ maxPerPackage: 0 }))).toThrow('maxPerPackage must be a positive integer');
    });
});
