export * from './file-processing.interface';
export * from './file-processing.model';
