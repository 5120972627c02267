export type FileProcessingStatus = 'processing' | 'completed' | 'failed';

export interface IFileProcessing {
    id: number;
    processingUuid: string;
    fileName: string;
    totalShipments: number;
    totalPackages: number;
    status: FileProcessingStatus;
    startedAt: Date;
    finishedAt: Date | null;
    result: Record<string, unknown> | null;
    errorMessage: string | null;
    metadata: Record<string, unknown>;
    emailSent: boolean;
    signedUrl: string | null;
    completionData: Record<string, unknown> | null;
    createdAt: Date;
    updatedAt: Date;
}

export interface CreateFileProcessingInput {
    processingUuid: string;
    fileName: string;
    totalShipments: number;
    totalPackages: number;
    metadata?: Record<string, unknown>;
}

export interface FileProcessingUpdate {
    status?: FileProcessingStatus;
    result?: Record<string, unknown>;
    errorMessage?: string;
    metadata?: Record<string, unknown>;
}

export interface CompletionUpdate {
    emailSent: boolean;
    signedUrl?: string | null;
    completionData?: Record<string, unknown>;
}
