const readInt = (value: string | undefined, fallback: number): number => {
    const parsed = parseInt(value ?? '', 10);
    return Number.isNaN(parsed) ? fallback : parsed;
};

const readBool = (value: string | undefined, fallback: boolean): boolean => {
    if (value === undefined || value === '') return fallback;
    return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
};

export interface BucketConfig {
    jsonPending: string;
    jsonToProcess: string;
    imagesTemp: string;
    imagesOriginal: string;
}

export interface ProcessingConfig {
    maxShipmentsPerFile: number;
    validateImageUrls: boolean;
    fileCompletionTimeoutSeconds: number;
    fileCompletionPollMs: number;
    urlValidationConcurrency: number;
    urlValidationTimeoutMs: number;
    imageDownloadTimeoutMs: number;
    maxImageSizeMb: number;
    signedUrlExpirationHours: number;
    tempFilesCleanupHours: number;
}

export interface TopicConfig {
    fileProcessed: string;
    imagesReady: string;
    emailSend: string;
    errors: string;
}

export interface TasksConfig {
    queue: string;
    location: string;
    handlerBaseUrl: string;
    serviceAccountEmail: string;
}

export const bucketConfig: BucketConfig = {
    jsonPending: process.env.BUCKET_JSON_PENDING || 'json-pending',
    jsonToProcess: process.env.BUCKET_JSON_TO_PROCESS || 'json-to-process',
    imagesTemp: process.env.BUCKET_IMAGES_TEMP || 'images-temp',
    imagesOriginal: process.env.BUCKET_IMAGES_ORIGINAL || 'images-original'
};

export const processingConfig: ProcessingConfig = {
    maxShipmentsPerFile: readInt(process.env.MAX_SHIPMENTS_PER_FILE, 100),
    validateImageUrls: readBool(process.env.VALIDATE_IMAGE_URLS, false),
    fileCompletionTimeoutSeconds: readInt(process.env.FILE_COMPLETION_TIMEOUT_SECONDS, 300),
    fileCompletionPollMs: readInt(process.env.FILE_COMPLETION_POLL_MS, 1000),
    urlValidationConcurrency: readInt(process.env.URL_VALIDATION_CONCURRENCY, 5),
    urlValidationTimeoutMs: readInt(process.env.URL_VALIDATION_TIMEOUT_MS, 10000),
    imageDownloadTimeoutMs: readInt(process.env.IMAGE_DOWNLOAD_TIMEOUT_MS, 30000),
    maxImageSizeMb: readInt(process.env.MAX_IMAGE_SIZE_MB, 50),
    signedUrlExpirationHours: readInt(process.env.SIGNED_URL_EXPIRATION_HOURS, 2),
    tempFilesCleanupHours: readInt(process.env.TEMP_FILES_CLEANUP_HOURS, 24)
};

export const topicConfig: TopicConfig = {
    fileProcessed: process.env.TOPIC_FILE_PROCESSED || 'file-processed',
    imagesReady: process.env.TOPIC_IMAGES_READY || 'images-ready',
    emailSend: process.env.TOPIC_EMAIL_SEND || 'email-send',
    errors: process.env.TOPIC_PROCESSING_ERRORS || 'processing-errors'
};

export const tasksConfig: TasksConfig = {
    queue: process.env.TASKS_QUEUE || '',
    location: process.env.TASKS_LOCATION || process.env.GCP_REGION || 'us-central1',
    handlerBaseUrl: process.env.IMAGE_PROCESSING_SERVICE_URL || '',
    serviceAccountEmail: process.env.TASKS_SA_EMAIL || ''
};
