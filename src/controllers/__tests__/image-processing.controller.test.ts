import { Sequelize } from 'sequelize';
import { createApp } from '@/app';
import { createInternalAuth } from '@/middleware/internal-auth.middleware';
import { CleanupTaskRepository, FileProcessingRepository, ImageProcessingRepository } from '@/repositories';
import { CleanupSchedulerService } from '@/services/image-processing/cleanup-scheduler.service';
import { ImageDownloaderService } from '@/services/image-processing/image-downloader.service';
import { PackageProcessorService } from '@/services/image-processing/package-processor.service';
import { SignedUrlService } from '@/services/image-processing/signed-url.service';
import { ZipCreatorService } from '@/services/image-processing/zip-creator.service';
import { createFakePublisher } from '@/test-utils/fake-publisher';
import { startTestServer, TestServer } from '@/test-utils/http';
import { InMemoryStorage } from '@/test-utils/in-memory-storage';
import { createTestDatabase } from '@/test-utils/sqlite';
import { encodePubSubData, JWTUtils, RequestLogger } from '@/utils';
import { ImageProcessingController } from '../image-processing.controller';

describe('ImageProcessingController', () => {
    let sequelize: Sequelize;
    let storage: InMemoryStorage;
    let server: TestServer;
    const authorization = { Authorization: `Bearer ${JWTUtils.signInternalToken('test-secret', 'cloud-tasks', 'cleanup-task')}` };

    beforeEach(async () => {
        sequelize = await createTestDatabase();
        storage = new InMemoryStorage();

        const cleanupScheduler = new CleanupSchedulerService(storage, new CleanupTaskRepository(sequelize), null, 'images-temp', 24);
        const processor = new PackageProcessorService(
            storage,
            new ImageDownloaderService(storage, { originalsBucket: 'images-original', maxImageSizeMb: 5, timeoutMs: 1000 }, { get: jest.fn() }),
            new ZipCreatorService(storage, 'images-temp', '2.0.0'),
            new SignedUrlService(storage, 2, { head: jest.fn() }),
            cleanupScheduler,
            new ImageProcessingRepository(sequelize),
            new FileProcessingRepository(sequelize),
            createFakePublisher()
        );
        const controller = new ImageProcessingController(processor, cleanupScheduler, new RequestLogger(), createInternalAuth({ secret: 'test-secret' }));
        server = await startTestServer(createApp({ routers: [controller.getRoutes()], corsOrigins: [] }));

        storage.put('images-original', 'photos/a.jpg', Buffer.alloc(300, 'a'));
        storage.putJson('json-to-process', 'p-1/orders_1_of_1.json', { shipments: [{ id: 1, images: ['photos/a.jpg'] }] });
    });

    afterEach(async () => {
        await server.close();
        await sequelize.close();
    });

    it('processes a package and reports its status', async () => {
        const response = await server.client.post('/process-package', {
            processingUuid: 'p-1',
            packageUri: 'gs://json-to-process/p-1/orders_1_of_1.json'
        });

        expect(response.status).toBe(200);
        expect(response.data.message).toBe('Package processed successfully');
        expect(response.data.data).toMatchObject({ packageNumber: '1_of_1', imagesProcessed: 1 });

        const status = await server.client.get('/processing-status/p-1');
        expect(status.data.data).toMatchObject({ completed: 1, expectedPackages: null, completionPercentage: 100 });
    });

    it('rejects package uris outside cloud storage', async () => {
        const response = await server.client.post('/process-package', { processingUuid: 'p-1', packageUri: 'https://example.com/p.json' });

        expect(response.status).toBe(400);
        expect(response.data.details).toEqual(['packageUri: packageUri must be a gs:// URI']);
    });

    it('processes a workflow trigger pushed by pub/sub', async () => {
        const response = await server.client.post('/process-pubsub', {
            message: { data: encodePubSubData({ processingUuid: 'p-1', packages: ['gs://json-to-process/p-1/orders_1_of_1.json'] }) }
        });

        expect(response.status).toBe(200);
        expect(response.data.message).toBe('Processed 1 packages');
    });

    it('returns 404 for unknown processings', async () => {
        const response = await server.client.get('/processing-status/unknown');

        expect(response.status).toBe(404);
    });

    it('schedules and executes cleanups behind the internal token', async () => {
        storage.put('images-temp', 'p-1/p-1_1_of_1_images.zip', 'zip');

        const anonymous = await server.client.post('/schedule-cleanup', { processingUuid: 'p-1' });
        const scheduled = await server.client.post('/schedule-cleanup', { processingUuid: 'p-1', cleanupAfterHours: 1 }, { headers: authorization });
        const executed = await server.client.post('/cleanup/execute/p-1', {}, { headers: authorization });
        const pending = await server.client.post('/cleanup/run-pending', {}, { headers: authorization });

        expect(anonymous.status).toBe(401);
        expect(scheduled.data.data).toMatchObject({ processingUuid: 'p-1', cleanupAfterHours: 1, taskName: null });
        expect(executed.data.message).toBe('Deleted 1 files');
        expect(storage.keys()).not.toContain('gs://images-temp/p-1/p-1_1_of_1_images.zip');
        expect(pending.data.message).toBe('Executed 0 pending cleanups');
    });
});
