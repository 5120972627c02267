export type ImageSourceType = 'gcs' | 'http';

export interface DownloadedImage {
    imagePath: string;
    success: true;
    fileName: string;
    content: Buffer;
    sizeBytes: number;
    fileExtension: string;
    sourceType: ImageSourceType;
}

export interface FailedImage {
    imagePath: string;
    success: false;
    error: string;
    sizeBytes: 0;
}

export type ImageDownloadResult = DownloadedImage | FailedImage;

export interface PackageDownloadResult {
    processingUuid: string;
    packageNumber: string;
    totalImages: number;
    successfulDownloads: number;
    failedDownloads: number;
    totalSizeBytes: number;
    totalSizeMb: number;
    results: ImageDownloadResult[];
    timestamp: string;
}

export interface ZipArchive {
    zipFileName: string;
    buffer: Buffer;
    filesAdded: number;
    zipSizeBytes: number;
    originalSizeBytes: number;
    compressionRatioPercent: number;
    sha256: string;
}

export interface UploadedZip {
    bucket: string;
    objectName: string;
    gcsUri: string;
    sizeBytes: number;
}

export interface SignedUrlResult {
    signedUrl: string;
    objectName: string;
    downloadFilename: string;
    expirationHours: number;
    expiresAt: Date;
    expiresInSeconds: number;
    fileSizeMb: number;
}

export interface UrlExpirationInfo {
    signedAt: Date;
    expiresAt: Date;
    expiresInSeconds: number;
    expired: boolean;
}

export interface PackageProcessingResult {
    status: 'success';
    processingUuid: string;
    packageName: string;
    packageNumber: string;
    imagesRequested: number;
    imagesProcessed: number;
    imagesFailed: number;
    zipObject: string;
    zipSizeMb: number;
    compressionRatioPercent: number;
    signedUrl: string;
    downloadFilename: string;
    expirationHours: number;
    expirationDatetime: string;
    cleanupScheduledFor: string | null;
    emailMessageId: string | null;
    timestamp: string;
}

export interface ProcessingStatusReport {
    processingUuid: string;
    expectedPackages: number | null;
    completed: number;
    failed: number;
    inProgress: number;
    completionPercentage: number;
    isComplete: boolean;
    packages: Array<{
        packageName: string;
        status: string;
        imagesProcessed: number;
        imagesFailed: number;
        signedUrl: string | null;
        errorMessage: string | null;
    }>;
}

export interface CleanupResult {
    processingUuid: string;
    filesDeleted: number;
    mbFreed: number;
    executedAt: string;
}
