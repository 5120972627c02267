import { RequestHandler, Router } from 'express';
import { database } from '@/config/database.init';
import { appConfig, ServiceName, serviceOrigin } from '@/config/app.config';
import { bucketConfig, processingConfig, tasksConfig, topicConfig } from '@/config/pipeline.config';
import { notificationConfig, smtpConfig } from '@/config/email.config';
import { internalAuthConfig } from '@/config/auth.config';
import { getConfigSummary } from '@/config/config.validation';
import { createInternalAuth } from '@/middleware/internal-auth.middleware';
import {
    CleanupTaskRepository,
    EmailNotificationRepository,
    FileProcessingRepository,
    ImageProcessingRepository,
    ShipmentImageRepository
} from '@/repositories';
import { RequestLogger } from '@/utils';

import { CloudStorageService } from '@/services/storage/cloud-storage.service';
import { GoogleApiClient } from '@/services/gcp/google-api.client';
import { CloudTasksService } from '@/services/gcp/cloud-tasks.service';
import { PubSubService } from '@/services/pubsub/pubsub.service';
import { FileValidatorService } from '@/services/division/file-validator.service';
import { ImageUrlValidatorService } from '@/services/division/image-url-validator.service';
import { DivisionProcessorService } from '@/services/division/division-processor.service';
import { ImageDownloaderService } from '@/services/image-processing/image-downloader.service';
import { ZipCreatorService } from '@/services/image-processing/zip-creator.service';
import { SignedUrlService } from '@/services/image-processing/signed-url.service';
import { CleanupSchedulerService } from '@/services/image-processing/cleanup-scheduler.service';
import { PackageProcessorService } from '@/services/image-processing/package-processor.service';
import { TemplateService } from '@/services/email/template.service';
import { EmailSenderService } from '@/services/email/email-sender.service';
import { NotificationService } from '@/services/email/notification.service';

import { HealthController, DependencyCheck } from '@/controllers/health.controller';
import { DivisionController } from '@/controllers/division.controller';
import { ImageProcessingController } from '@/controllers/image-processing.controller';
import { EmailController } from '@/controllers/email.controller';

export class ControllerFactory {
    private static database = database;
    private static requestLoggerService = new RequestLogger();
    private static googleApiClient = new GoogleApiClient();
    private static storageService = new CloudStorageService(appConfig.projectId || undefined);

    private static internalAuth(): RequestHandler {
        return createInternalAuth(internalAuthConfig);
    }

    private static createRepositories() {
        const sequelize = this.database.getSequelize();
        return {
            fileRepo: new FileProcessingRepository(sequelize),
            shipmentImageRepo: new ShipmentImageRepository(sequelize),
            imageProcessingRepo: new ImageProcessingRepository(sequelize),
            cleanupRepo: new CleanupTaskRepository(sequelize),
            notificationRepo: new EmailNotificationRepository(sequelize)
        };
    }

    private static createPublisher(serviceName: ServiceName): PubSubService {
        return new PubSubService(this.googleApiClient, appConfig.projectId, topicConfig, serviceOrigin(serviceName));
    }

    private static createDivisionServices() {
        const { fileRepo, shipmentImageRepo } = this.createRepositories();

        const fileValidator = new FileValidatorService(this.storageService, processingConfig);
        const urlValidator = new ImageUrlValidatorService({
            timeoutMs: processingConfig.urlValidationTimeoutMs,
            concurrency: processingConfig.urlValidationConcurrency
        });
        const divisionProcessor = new DivisionProcessorService(
            this.storageService,
            fileValidator,
            urlValidator,
            fileRepo,
            shipmentImageRepo,
            this.createPublisher('division'),
            bucketConfig,
            processingConfig,
            { origin: serviceOrigin('division'), version: appConfig.version }
        );

        return { fileValidator, urlValidator, divisionProcessor };
    }

    private static createImageServices() {
        const { fileRepo, imageProcessingRepo, cleanupRepo } = this.createRepositories();

        const tasks = new CloudTasksService(this.googleApiClient, appConfig.projectId, tasksConfig, internalAuthConfig);
        const cleanupScheduler = new CleanupSchedulerService(
            this.storageService,
            cleanupRepo,
            tasks,
            bucketConfig.imagesTemp,
            processingConfig.tempFilesCleanupHours
        );
        const packageProcessor = new PackageProcessorService(
            this.storageService,
            new ImageDownloaderService(this.storageService, {
                originalsBucket: bucketConfig.imagesOriginal,
                maxImageSizeMb: processingConfig.maxImageSizeMb,
                timeoutMs: processingConfig.imageDownloadTimeoutMs
            }),
            new ZipCreatorService(this.storageService, bucketConfig.imagesTemp, appConfig.version),
            new SignedUrlService(this.storageService, processingConfig.signedUrlExpirationHours),
            cleanupScheduler,
            imageProcessingRepo,
            fileRepo,
            this.createPublisher('image-processing')
        );

        return { cleanupScheduler, packageProcessor };
    }

    private static createEmailServices() {
        const { fileRepo, notificationRepo } = this.createRepositories();

        const templateService = new TemplateService(notificationConfig.templatesDir);
        const emailSender = new EmailSenderService(smtpConfig, templateService);
        const notificationService = new NotificationService(
            emailSender,
            templateService,
            fileRepo,
            notificationRepo,
            notificationConfig,
            smtpConfig.fromEmail,
            serviceOrigin('email')
        );

        return { templateService, emailSender, notificationService };
    }

    public static createDivisionController(): DivisionController {
        const { divisionProcessor, fileValidator, urlValidator } = this.createDivisionServices();

        return new DivisionController(
            divisionProcessor,
            fileValidator,
            urlValidator,
            this.requestLoggerService,
            this.internalAuth(),
            bucketConfig.jsonPending
        );
    }

    public static createImageProcessingController(): ImageProcessingController {
        const { packageProcessor, cleanupScheduler } = this.createImageServices();

        return new ImageProcessingController(
            packageProcessor,
            cleanupScheduler,
            this.requestLoggerService,
            this.internalAuth()
        );
    }

    public static createEmailController(): EmailController {
        const { notificationService, templateService } = this.createEmailServices();

        return new EmailController(
            notificationService,
            templateService,
            this.requestLoggerService,
            this.internalAuth()
        );
    }

    public static createHealthController(serviceName: ServiceName): HealthController {
        const dependencies: Record<string, DependencyCheck> = {
            database: () => this.database.ping()
        };

        if (serviceName === 'division' || serviceName === 'image-processing') {
            const bucket = serviceName === 'division' ? bucketConfig.jsonPending : bucketConfig.imagesTemp;
            dependencies.storage = async () => {
                await this.storageService.listFiles(bucket, '__status__/');
                return 'connected';
            };
        }
        if (serviceName === 'email') {
            const { emailSender } = this.createEmailServices();
            dependencies.smtp = () => emailSender.checkConnectivity();
        }

        return new HealthController(serviceOrigin(serviceName), appConfig.version, dependencies, getConfigSummary);
    }

    public static createServiceRouters(serviceName: ServiceName): Router[] {
        const health = this.createHealthController(serviceName).getRoutes();

        switch (serviceName) {
            case 'division':
                return [health, this.createDivisionController().getRoutes()];
            case 'image-processing':
                return [health, this.createImageProcessingController().getRoutes()];
            case 'email':
                return [health, this.createEmailController().getRoutes()];
        }
    }
}
