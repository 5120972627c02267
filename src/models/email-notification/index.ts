export * from './email-notification.interface';
export * from './email-notification.model';
