export * from './messaging.interface';
