export * from './storage.interface';
