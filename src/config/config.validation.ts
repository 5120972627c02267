import { appConfig } from './app.config';
import { bucketConfig, processingConfig, topicConfig, tasksConfig, BucketConfig, ProcessingConfig } from './pipeline.config';
import { smtpConfig, notificationConfig } from './email.config';
import { internalAuthConfig } from './auth.config';

export const validateConfig = (
    buckets: BucketConfig = bucketConfig,
    processing: ProcessingConfig = processingConfig
): void => {
    const problems: string[] = [];

    if (!Number.isInteger(processing.maxShipmentsPerFile) || processing.maxShipmentsPerFile <= 0) {
        problems.push('MAX_SHIPMENTS_PER_FILE must be a positive integer');
    }

    for (const [key, value] of Object.entries(buckets)) {
        if (!value) {
            problems.push(`Bucket "${key}" must not be empty`);
        }
    }

    if (processing.signedUrlExpirationHours <= 0) {
        problems.push('SIGNED_URL_EXPIRATION_HOURS must be positive');
    }

    if (problems.length > 0) {
        throw new Error(`Invalid configuration: ${problems.join('; ')}`);
    }
};

export const getConfigSummary = () => ({
    app: {
        name: appConfig.appName,
        service: appConfig.serviceName,
        version: appConfig.version,
        environment: appConfig.env,
        projectId: appConfig.projectId || null,
        region: appConfig.region
    },
    buckets: { ...bucketConfig },
    topics: { ...topicConfig },
    processing: {
        maxShipmentsPerFile: processingConfig.maxShipmentsPerFile,
        validateImageUrls: processingConfig.validateImageUrls,
        signedUrlExpirationHours: processingConfig.signedUrlExpirationHours,
        tempFilesCleanupHours: processingConfig.tempFilesCleanupHours
    },
    cleanupQueue: tasksConfig.queue || null,
    smtp: {
        host: smtpConfig.host,
        port: smtpConfig.port,
        authenticated: Boolean(smtpConfig.user && smtpConfig.password),
        recipients: notificationConfig.recipients.length
    },
    internalAuth: internalAuthConfig.secret ? 'enabled' : 'disabled'
});

