export type CleanupStatus = 'pending' | 'completed' | 'failed';

export interface ICleanupTask {
    id: number;
    processingUuid: string;
    scheduledFor: Date;
    cleanupAfterHours: number;
    status: CleanupStatus;
    taskName: string | null;
    result: Record<string, unknown> | null;
    executedAt: Date | null;
    createdAt: Date;
    updatedAt: Date;
}
