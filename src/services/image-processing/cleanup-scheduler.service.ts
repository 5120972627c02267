import { StorageGateway } from '@/models/storage';
import { CleanupResult } from '@/models/image-processing';
import { ICleanupTask } from '@/models/cleanup-task';
import { CleanupTaskRepository } from '@/repositories';
import { getErrorMessage, logger, roundTo } from '@/utils';
import { CloudTasksService } from '../gcp/cloud-tasks.service';

export interface ScheduledCleanup {
    processingUuid: string;
    scheduledFor: string;
    cleanupAfterHours: number;
    taskName: string | null;
}

export class CleanupSchedulerService {
    constructor(
        private readonly storage: StorageGateway,
        private readonly cleanupRepo: CleanupTaskRepository,
        private readonly tasks: CloudTasksService | null,
        private readonly tempBucket: string,
        private readonly defaultHours: number
    ) {}

    async scheduleCleanup(processingUuid: string, cleanupAfterHours?: number, now: Date = new Date()): Promise<ScheduledCleanup> {
        const hours = cleanupAfterHours ?? this.defaultHours;
        const scheduledFor = new Date(now.getTime() + hours * 3600 * 1000);
        const task = await this.cleanupRepo.scheduleCleanup(processingUuid, scheduledFor, hours);

        let taskName: string | null = null;
        if (this.tasks?.isEnabled()) {
            try {
                taskName = await this.tasks.enqueueHttpTask({
                    path: `/cleanup/execute/${encodeURIComponent(processingUuid)}`,
                    body: { processingUuid },
                    scheduleTime: scheduledFor
                });
                if (taskName) {
                    await this.cleanupRepo.setTaskName(task.id, taskName);
                }
            } catch (error) {
                logger.warn('Cleanup task could not be enqueued; it will run from the pending sweep', {
                    traceId: processingUuid,
                    error: getErrorMessage(error)
                });
            }
        }

        logger.info(`Cleanup scheduled for ${scheduledFor.toISOString()}`, { traceId: processingUuid, hours });

        return {
            processingUuid,
            scheduledFor: scheduledFor.toISOString(),
            cleanupAfterHours: hours,
            taskName
        };
    }

    async executeCleanup(processingUuid: string): Promise<CleanupResult> {
        try {
            const files = await this.storage.listFiles(this.tempBucket, `${processingUuid}/`);
            let bytesFreed = 0;
            for (const file of files) {
                await this.storage.delete(this.tempBucket, file.name);
                bytesFreed += file.size;
            }

            const result: CleanupResult = {
                processingUuid,
                filesDeleted: files.length,
                mbFreed: roundTo(bytesFreed / (1024 * 1024)),
                executedAt: new Date().toISOString()
            };

            await this.cleanupRepo.markExecuted(processingUuid, 'completed', { ...result });
            logger.info(`Cleanup executed: ${files.length} files deleted`, { traceId: processingUuid, mbFreed: result.mbFreed });
            return result;
        } catch (error) {
            await this.cleanupRepo.markExecuted(processingUuid, 'failed', { error: getErrorMessage(error) });
            throw error;
        }
    }

    async executePendingCleanups(now: Date = new Date()): Promise<{ executed: CleanupResult[]; failed: Array<{ processingUuid: string; error: string }> }> {
        const due: ICleanupTask[] = await this.cleanupRepo.getDueTasks(now);
        const processingUuids = [...new Set(due.map(task => task.processingUuid))];
        const executed: CleanupResult[] = [];
        const failed: Array<{ processingUuid: string; error: string }> = [];

        for (const processingUuid of processingUuids) {
            try {
                executed.push(await this.executeCleanup(processingUuid));
            } catch (error) {
                failed.push({ processingUuid, error: getErrorMessage(error) });
            }
        }

        return { executed, failed };
    }
}
