import { Sequelize, Op } from 'sequelize';
import { initModels, Models } from '@/models';
import { ICleanupTask, CleanupTaskModel } from '@/models/cleanup-task';
import { logger } from '@/utils';

export class CleanupTaskRepository {
    private models: Models;

    constructor(sequelize: Sequelize) {
        this.models = initModels(sequelize);
    }

    async scheduleCleanup(processingUuid: string, scheduledFor: Date, cleanupAfterHours: number): Promise<ICleanupTask> {
        try {
            const task = await this.models.CleanupTask.create({
                processingUuid,
                scheduledFor,
                cleanupAfterHours,
                status: 'pending'
            });
            return this.mapToICleanupTask(task);
        } catch (error) {
            logger.error('Error in scheduleCleanup', error);
            throw error;
        }
    }

    async setTaskName(id: number, taskName: string): Promise<void> {
        try {
            await this.models.CleanupTask.update({ taskName }, { where: { id } });
        } catch (error) {
            logger.error('Error in setTaskName', error);
            throw error;
        }
    }

    async getDueTasks(now: Date = new Date()): Promise<ICleanupTask[]> {
        try {
            const tasks = await this.models.CleanupTask.findAll({
                where: {
                    status: 'pending',
                    scheduledFor: { [Op.lte]: now }
                },
                order: [['scheduledFor', 'ASC']]
            });
            return tasks.map(task => this.mapToICleanupTask(task));
        } catch (error) {
            logger.error('Error in getDueTasks', error);
            throw error;
        }
    }

    async markExecuted(processingUuid: string, status: 'completed' | 'failed', result: Record<string, unknown>): Promise<number> {
        try {
            const [affectedCount] = await this.models.CleanupTask.update(
                { status, result, executedAt: new Date() },
                { where: { processingUuid, status: 'pending' } }
            );
            return affectedCount;
        } catch (error) {
            logger.error('Error in markExecuted', error);
            throw error;
        }
    }

    private mapToICleanupTask(task: CleanupTaskModel): ICleanupTask {
        return {
            id: task.id,
            processingUuid: task.processingUuid,
            scheduledFor: task.scheduledFor,
            cleanupAfterHours: task.cleanupAfterHours,
            status: task.status,
            taskName: task.taskName ?? null,
            result: task.result ?? null,
            executedAt: task.executedAt ?? null,
            createdAt: task.createdAt,
            updatedAt: task.updatedAt
        };
    }
}
