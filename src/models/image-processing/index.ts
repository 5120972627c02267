export * from './image-processing.interface';
export * from './image-processing.model';
export * from './image-package.interface';
