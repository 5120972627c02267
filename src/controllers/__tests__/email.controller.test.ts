import path from 'path';
import { Sequelize } from 'sequelize';
import { createApp } from '@/app';
import { createInternalAuth } from '@/middleware/internal-auth.middleware';
import { EmailNotificationRepository, FileProcessingRepository } from '@/repositories';
import { EmailSenderService, MailTransport } from '@/services/email/email-sender.service';
import { NotificationService } from '@/services/email/notification.service';
import { TemplateService } from '@/services/email/template.service';
import { startTestServer, TestServer } from '@/test-utils/http';
import { createTestDatabase } from '@/test-utils/sqlite';
import { encodePubSubData, JWTUtils, RequestLogger } from '@/utils';
import { EmailController } from '../email.controller';

describe('EmailController', () => {
    let sequelize: Sequelize;
    let server: TestServer;
    let sendMail: jest.MockedFunction<MailTransport['sendMail']>;

    beforeEach(async () => {
        sequelize = await createTestDatabase();
        sendMail = jest.fn<ReturnType<MailTransport['sendMail']>, Parameters<MailTransport['sendMail']>>().mockResolvedValue({ messageId: 'm-1' });

        const templates = new TemplateService(path.resolve(__dirname, '../../../templates'));
        const fileRepo = new FileProcessingRepository(sequelize);
        const notifications = new NotificationService(
            new EmailSenderService(
                { host: 'smtp.test', port: 587, secure: false, user: '', password: '', fromEmail: 'noreply@example.com', fromName: 'Shipments' },
                templates,
                { sendMail, verify: async () => true }
            ),
            templates,
            fileRepo,
            new EmailNotificationRepository(sequelize),
            { recipients: ['ops@example.com'], adminEmail: 'admin@example.com', templatesDir: '' },
            'fallback@example.com',
            'email-service'
        );
        const controller = new EmailController(notifications, templates, new RequestLogger(), createInternalAuth({ secret: 'test-secret' }));

        await fileRepo.createProcessingRecord({ processingUuid: 'p-1', fileName: 'orders.json', totalShipments: 1, totalPackages: 1 });
        server = await startTestServer(createApp({ routers: [controller.getRoutes()], corsOrigins: [] }));
    });

    afterEach(async () => {
        await server.close();
        await sequelize.close();
    });

    it('sends the completion email', async () => {
        const response = await server.client.post('/send-completion-email', { processingUuid: 'p-1', signedUrl: 'https://storage.test/1' });

        expect(response.status).toBe(200);
        expect(response.data.message).toBe('Completion email sent to 1 recipients');
        expect(response.data.data).toMatchObject({ success: true, emailsSent: 1, databaseUpdated: true });
    });

    it('validates the completion request', async () => {
        const response = await server.client.post('/send-completion-email', { signedUrl: 'https://storage.test/1' });

        expect(response.status).toBe(400);
        expect(response.data).toEqual({
            success: false,
            message: 'Failed to send completion email',
            error: 'Invalid request',
            details: ['processingUuid: Required']
        });
    });

    it('returns 404 for unknown processings', async () => {
        const response = await server.client.post('/send-completion-email', { processingUuid: 'p-unknown' });

        expect(response.status).toBe(404);
        expect(response.data.error).toBe('Processing not found: p-unknown');
    });

    it('lists and describes templates', async () => {
        const list = await server.client.get('/templates');
        const missing = await server.client.get('/templates/missing');

        expect(list.data.data.count).toBe(4);
        expect(missing.status).toBe(404);
        expect(missing.data.error).toBe('Template not found: missing');
    });

    it('protects custom emails with the internal token', async () => {
        const body = { toEmail: 'ops@example.com', subject: 'Hello', templateData: { message: 'Hi' } };

        const anonymous = await server.client.post('/send-custom-email', body);
        const authorized = await server.client.post('/send-custom-email', body, {
            headers: { Authorization: `Bearer ${JWTUtils.signInternalToken('test-secret', 'scheduler', 'tests')}` }
        });

        expect(anonymous.status).toBe(401);
        expect(authorized.status).toBe(200);
        expect(authorized.data.message).toBe('Email sent');
        expect(sendMail).toHaveBeenCalledTimes(1);
    });

    it('handles pub/sub pushed email requests', async () => {
        const response = await server.client.post('/pubsub-handler', {
            message: { data: encodePubSubData({ action: 'send_error_notification', errorMessage: 'boom', processingUuid: 'p-1' }) }
        });

        expect(response.status).toBe(200);
        expect(response.data.message).toBe('Handled send_error_notification');
        expect(sendMail.mock.calls[0][0].to).toBe('admin@example.com');
    });

    it('rejects an out of range statistics window', async () => {
        const ok = await server.client.get('/statistics', { params: { days: 30 } });
        const invalid = await server.client.get('/statistics', { params: { days: 0 } });

        expect(ok.data.data).toMatchObject({ periodDays: 30, total: 0, successRate: 0 });
        expect(invalid.status).toBe(400);
    });
});
