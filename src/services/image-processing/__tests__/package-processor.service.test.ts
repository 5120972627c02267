import { Sequelize } from 'sequelize';
import { CleanupTaskRepository, FileProcessingRepository, ImageProcessingRepository } from '@/repositories';
import { createTestDatabase, findPendingCleanups } from '@/test-utils/sqlite';
import { InMemoryStorage } from '@/test-utils/in-memory-storage';
import { createFakePublisher, FakePublisher } from '@/test-utils/fake-publisher';
import { NotFoundError, ValidationError } from '@/utils';
import { CleanupSchedulerService } from '../cleanup-scheduler.service';
import { ImageDownloaderService } from '../image-downloader.service';
import { extractImagePaths, extractPackageNumber, PackageProcessorService } from '../package-processor.service';
import { SignedUrlService } from '../signed-url.service';
import { ZipCreatorService } from '../zip-creator.service';

const PACKAGE_URI = 'gs://json-to-process/p-1/shipments_1_of_2.json';

describe('package helpers', () => {
    it('reads the package number from the name', () => {
        expect(extractPackageNumber('shipments_3_of_7.json')).toBe('3_of_7');
        expect(extractPackageNumber('shipments.json')).toBe('1_of_1');
    });

    it('collects unique image paths from strings and objects', () => {
        expect(extractImagePaths([
            { id: 1, images: ['a.jpg', { path: ' b.png ' }, '  '] },
            { id: 2, images: ['a.jpg', { url: 'ignored.jpg' }] },
            { id: 3, images: 'not-a-list' }
        ])).toEqual(['a.jpg', 'b.png']);
    });
});

describe('PackageProcessorService', () => {
    let sequelize: Sequelize;
    let storage: InMemoryStorage;
    let publisher: FakePublisher;
    let imageRepo: ImageProcessingRepository;
    let fileRepo: FileProcessingRepository;
    let processor: PackageProcessorService;

    beforeEach(async () => {
        sequelize = await createTestDatabase();
        storage = new InMemoryStorage();
        publisher = createFakePublisher();
        imageRepo = new ImageProcessingRepository(sequelize);
        fileRepo = new FileProcessingRepository(sequelize);

        processor = new PackageProcessorService(
            storage,
            new ImageDownloaderService(storage, { originalsBucket: 'images-original', maxImageSizeMb: 5, timeoutMs: 1000 }, { get: jest.fn() }),
            new ZipCreatorService(storage, 'images-temp', '2.0.0'),
            new SignedUrlService(storage, 2, { head: jest.fn() }),
            new CleanupSchedulerService(storage, new CleanupTaskRepository(sequelize), null, 'images-temp', 24),
            imageRepo,
            fileRepo,
            publisher
        );

        storage.put('images-original', 'photos/a.jpg', Buffer.alloc(500, 'a'));
        storage.put('images-original', 'photos/b.png', Buffer.alloc(500, 'b'));
    });

    afterEach(async () => {
        await sequelize.close();
    });

    it('zips the package images and requests the completion email', async () => {
        storage.putJson('json-to-process', 'p-1/shipments_1_of_2.json', {
            shipments: [
                { id: 1, images: ['photos/a.jpg', { path: 'photos/b.png' }] },
                { id: 2, images: ['photos/a.jpg', 'photos/missing.jpg'] }
            ]
        });

        const result = await processor.processPackage({ processingUuid: 'p-1', packageUri: PACKAGE_URI });

        expect(result).toMatchObject({
            status: 'success',
            packageName: 'shipments_1_of_2.json',
            packageNumber: '1_of_2',
            imagesRequested: 3,
            imagesProcessed: 2,
            imagesFailed: 1,
            zipObject: 'gs://images-temp/p-1/p-1_1_of_2_images.zip',
            signedUrl: 'https://storage.test/images-temp/p-1/p-1_1_of_2_images.zip?X-Goog-Signature=test',
            downloadFilename: 'p-1_1_of_2_images.zip',
            expirationHours: 2,
            emailMessageId: 'msg-email'
        });
        expect(result.cleanupScheduledFor).not.toBeNull();
        expect(publisher.publishImagesReady).toHaveBeenCalledWith({
            processingUuid: 'p-1',
            packageName: 'shipments_1_of_2.json',
            zipObject: 'p-1/p-1_1_of_2_images.zip',
            imagesProcessed: 2
        });
        expect(publisher.publishEmailRequest).toHaveBeenCalledWith(expect.objectContaining({
            action: 'send_completion_email',
            processingUuid: 'p-1',
            signedUrl: result.signedUrl,
            imagesProcessed: 2,
            imagesFailed: 1
        }));

        const [record] = await imageRepo.getByProcessingUuid('p-1');
        expect(record.status).toBe('completed');
        expect(record.zipObjectName).toBe('p-1/p-1_1_of_2_images.zip');
    });

    it('fails a package without images and does not publish an error', async () => {
        storage.putJson('json-to-process', 'p-1/shipments_1_of_2.json', { shipments: [{ id: 1 }] });

        await expect(processor.processPackage({ processingUuid: 'p-1', packageUri: PACKAGE_URI })).rejects.toThrow(
            new ValidationError('Package shipments_1_of_2.json references no images')
        );
        expect(publisher.publishError).not.toHaveBeenCalled();

        const [record] = await imageRepo.getByProcessingUuid('p-1');
        expect(record.status).toBe('failed');
        expect(record.errorMessage).toBe('Package shipments_1_of_2.json references no images');
    });

    it('publishes an error when no image could be downloaded', async () => {
        storage.putJson('json-to-process', 'p-1/shipments_1_of_2.json', { shipments: [{ id: 1, images: ['photos/missing.jpg'] }] });

        await expect(processor.processPackage({ processingUuid: 'p-1', packageUri: PACKAGE_URI })).rejects.toThrow(
            'None of the 1 images of shipments_1_of_2.json could be downloaded'
        );
        expect(publisher.publishError).toHaveBeenCalledWith(expect.objectContaining({
            processingUuid: 'p-1',
            errorMessage: 'None of the 1 images of shipments_1_of_2.json could be downloaded',
            severity: 'error'
        }));
        expect(publisher.publishEmailRequest).not.toHaveBeenCalled();
    });

    it('still returns the result when the email request cannot be published', async () => {
        storage.putJson('json-to-process', 'p-1/shipments_1_of_2.json', { shipments: [{ id: 1, images: ['photos/a.jpg'] }] });
        publisher.publishEmailRequest.mockRejectedValue(new Error('topic missing'));

        const result = await processor.processPackage({ processingUuid: 'p-1', packageUri: PACKAGE_URI });

        expect(result.emailMessageId).toBeNull();
        expect(publisher.publishError).toHaveBeenCalledWith(expect.objectContaining({
            errorMessage: 'Email request not published: topic missing',
            severity: 'warning'
        }));
    });

    it('processes the published packages with a single combined email', async () => {
        storage.putJson('json-to-process', 'p-1/shipments_1_of_2.json', { shipments: [{ id: 1, images: ['photos/a.jpg'] }] });
        storage.putJson('json-to-process', 'p-1/shipments_2_of_2.json', { shipments: [{ id: 2, images: ['photos/b.png'] }] });

        const batch = await processor.processPublishedPackages({
            processingUuid: 'p-1',
            originalFile: 'orders.json',
            packages: [PACKAGE_URI, 'gs://json-to-process/p-1/shipments_2_of_2.json', 'gs://json-to-process/p-1/missing.json']
        });

        expect(batch.packagesProcessed).toBe(2);
        expect(batch.packagesFailed).toBe(1);
        expect(batch.failures).toEqual([{
            packageUri: 'gs://json-to-process/p-1/missing.json',
            error: 'No such object: gs://json-to-process/p-1/missing.json'
        }]);
        expect(batch.emailMessageId).toBe('msg-email');
        expect(publisher.publishEmailRequest).toHaveBeenCalledTimes(1);
        expect(publisher.publishEmailRequest.mock.calls[0][0]).toMatchObject({
            signedUrls: [
                'https://storage.test/images-temp/p-1/p-1_1_of_2_images.zip?X-Goog-Signature=test',
                'https://storage.test/images-temp/p-1/p-1_2_of_2_images.zip?X-Goog-Signature=test'
            ],
            imagesProcessed: 2,
            imagesFailed: 0
        });
    });

    it('schedules one cleanup for the whole batch', async () => {
        storage.putJson('json-to-process', 'p-1/shipments_1_of_2.json', { shipments: [{ id: 1, images: ['photos/a.jpg'] }] });
        storage.putJson('json-to-process', 'p-1/shipments_2_of_2.json', { shipments: [{ id: 2, images: ['photos/b.png'] }] });

        const batch = await processor.processPublishedPackages({
            processingUuid: 'p-1',
            packages: [PACKAGE_URI, 'gs://json-to-process/p-1/shipments_2_of_2.json']
        });

        expect(await findPendingCleanups(sequelize, 'p-1')).toHaveLength(1);
        expect(batch.cleanupScheduledFor).not.toBeNull();
        expect(batch.results.map(result => result.cleanupScheduledFor)).toEqual([batch.cleanupScheduledFor, batch.cleanupScheduledFor]);
    });

    it('reports processing progress against the expected packages', async () => {
        await fileRepo.createProcessingRecord({ processingUuid: 'p-1', fileName: 'orders.json', totalShipments: 4, totalPackages: 2 });
        storage.putJson('json-to-process', 'p-1/shipments_1_of_2.json', { shipments: [{ id: 1, images: ['photos/a.jpg'] }] });
        await processor.processPackage({ processingUuid: 'p-1', packageUri: PACKAGE_URI });

        const status = await processor.getProcessingStatus('p-1');

        expect(status).toMatchObject({
            expectedPackages: 2,
            completed: 1,
            failed: 0,
            inProgress: 0,
            completionPercentage: 50,
            isComplete: false
        });
        expect(status.packages[0].packageName).toBe('shipments_1_of_2.json');
    });

    it('rejects unknown processings', async () => {
        await expect(processor.getProcessingStatus('unknown')).rejects.toBeInstanceOf(NotFoundError);
    });
});
