export type ImageProcessingStatus = 'in_progress' | 'completed' | 'failed';

export interface IImageProcessing {
    id: number;
    processingUuid: string;
    packageName: string;
    packageUri: string;
    status: ImageProcessingStatus;
    imagesProcessed: number;
    imagesFailed: number;
    zipObjectName: string | null;
    signedUrl: string | null;
    expiresAt: Date | null;
    result: Record<string, unknown> | null;
    errorMessage: string | null;
    startedAt: Date;
    finishedAt: Date | null;
    createdAt: Date;
    updatedAt: Date;
}

export interface ImageProcessingCompletion {
    imagesProcessed: number;
    imagesFailed: number;
    zipObjectName: string;
    signedUrl: string;
    expiresAt: Date;
    result: Record<string, unknown>;
}
