export * from './cleanup-task.interface';
export * from './cleanup-task.model';
