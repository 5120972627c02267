import { Sequelize } from 'sequelize';
import { ProcessingConfig } from '@/config/pipeline.config';
import { createApp } from '@/app';
import { createInternalAuth } from '@/middleware/internal-auth.middleware';
import { FileProcessingRepository, ShipmentImageRepository } from '@/repositories';
import { DivisionProcessorService } from '@/services/division/division-processor.service';
import { FileValidatorService } from '@/services/division/file-validator.service';
import { ImageUrlValidatorService } from '@/services/division/image-url-validator.service';
import { createFakePublisher, FakePublisher } from '@/test-utils/fake-publisher';
import { startTestServer, TestServer } from '@/test-utils/http';
import { InMemoryStorage } from '@/test-utils/in-memory-storage';
import { createTestDatabase } from '@/test-utils/sqlite';
import { encodePubSubData, JWTUtils, RequestLogger } from '@/utils';
import { DivisionController } from '../division.controller';

const processing: ProcessingConfig = {
    maxShipmentsPerFile: 2,
    validateImageUrls: false,
    fileCompletionTimeoutSeconds: 2,
    fileCompletionPollMs: 1,
    urlValidationConcurrency: 2,
    urlValidationTimeoutMs: 1000,
    imageDownloadTimeoutMs: 1000,
    maxImageSizeMb: 5,
    signedUrlExpirationHours: 2,
    tempFilesCleanupHours: 24
};

describe('DivisionController', () => {
    let sequelize: Sequelize;
    let storage: InMemoryStorage;
    let server: TestServer;
    let publisher: FakePublisher;
    const head = jest.fn();

    const startServer = async (config: ProcessingConfig = processing): Promise<TestServer> => {
        const fileValidator = new FileValidatorService(storage, config);
        const urlValidator = new ImageUrlValidatorService({ timeoutMs: 1000, concurrency: 2 }, { head });
        const processor = new DivisionProcessorService(
            storage,
            fileValidator,
            urlValidator,
            new FileProcessingRepository(sequelize),
            new ShipmentImageRepository(sequelize),
            publisher,
            { jsonPending: 'json-pending', jsonToProcess: 'json-to-process', imagesTemp: 'images-temp', imagesOriginal: 'images-original' },
            config,
            { origin: 'division-service', version: '2.0.0' }
        );
        const controller = new DivisionController(
            processor,
            fileValidator,
            urlValidator,
            new RequestLogger(),
            createInternalAuth({ secret: 'test-secret' }),
            'json-pending'
        );
        return startTestServer(createApp({ routers: [controller.getRoutes()], corsOrigins: [] }));
    };

    beforeEach(async () => {
        sequelize = await createTestDatabase();
        storage = new InMemoryStorage();
        publisher = createFakePublisher();
        head.mockReset();
        server = await startServer();
    });

    afterEach(async () => {
        await server.close();
        await sequelize.close();
    });

    it('acknowledges ignored storage events', async () => {
        const response = await server.client.post('/process-file', { bucket: 'json-pending', name: 'notes.txt' });

        expect(response.status).toBe(200);
        expect(response.data).toEqual({ success: true, message: 'Not a JSON file: notes.txt' });
    });

    it('rejects events without bucket and name', async () => {
        const response = await server.client.post('/process-file', { kind: 'storage#object' });

        expect(response.status).toBe(400);
        expect(response.data.error).toBe('Invalid storage event');
        expect(response.data.details).toEqual(['bucket: Required', 'name: Required']);
    });

    it('divides a file delivered through a pub/sub envelope and serves its record', async () => {
        storage.putJson('json-pending', 'orders.json', { shipments: [{ id: 1 }, { id: 2 }, { id: 3 }] });

        const response = await server.client.post('/process-file', {
            message: { data: encodePubSubData({ bucket: 'json-pending', name: 'orders.json' }) }
        });

        expect(response.status).toBe(200);
        expect(response.data.message).toBe('File divided successfully');
        expect(response.data.data.packagesCreated).toBe(2);

        const record = await server.client.get(`/process-by-uuid/${response.data.data.processingUuid}`);
        expect(record.status).toBe(200);
        expect(record.data.data).toMatchObject({ fileName: 'orders.json', totalShipments: 3, status: 'completed' });
    });

    it('returns 400 with details for invalid documents', async () => {
        storage.putJson('json-pending', 'bad.json', { shipments: [] });

        const response = await server.client.post('/process-file', { bucket: 'json-pending', name: 'bad.json' });

        expect(response.status).toBe(400);
        expect(response.data.details).toEqual(["Field 'shipments' must not be empty"]);
    });

    it('returns 400 without an error report for files that are not valid JSON', async () => {
        storage.put('json-pending', 'broken.json', '{"shipments": [ {"id": 1}, ', 'application/json');

        const response = await server.client.post('/process-file', { bucket: 'json-pending', name: 'broken.json' });

        expect(response.status).toBe(400);
        expect(response.data.error).toBe('Invalid file structure');
        expect(response.data.details).toEqual([expect.stringMatching(/^File is not valid JSON: /)]);
        expect(publisher.publishError).not.toHaveBeenCalled();
    });

    it('returns 408 when the upload never finishes', async () => {
        await server.close();
        server = await startServer({ ...processing, fileCompletionTimeoutSeconds: 0 });

        const response = await server.client.post('/process-file', { bucket: 'json-pending', name: 'late.json' });

        expect(response.status).toBe(408);
        expect(response.data).toEqual({
            success: false,
            message: 'Failed to process file',
            error: 'File did not finish uploading within 0 seconds'
        });
    });

    it('returns 404 for unknown processings', async () => {
        const response = await server.client.get('/process-by-uuid/unknown');

        expect(response.status).toBe(404);
        expect(response.data.error).toBe('Processing not found: unknown');
    });

    it('requires the internal token for file statistics', async () => {
        storage.putJson('json-pending', 'orders.json', { shipments: [{ id: 1 }] });
        const token = JWTUtils.signInternalToken('test-secret', 'tests', 'tests');

        const anonymous = await server.client.get('/file-statistics', { params: { name: 'orders.json' } });
        const found = await server.client.get('/file-statistics', { params: { name: 'orders.json' }, headers: { Authorization: `Bearer ${token}` } });
        const missing = await server.client.get('/file-statistics', { params: { name: 'gone.json' }, headers: { Authorization: `Bearer ${token}` } });

        expect(anonymous.status).toBe(401);
        expect(found.status).toBe(200);
        expect(found.data.data).toMatchObject({ bucket: 'json-pending', name: 'orders.json' });
        expect(missing.status).toBe(404);
    });
});
