export { FileProcessingRepository } from './file-processing.repository';
export { ShipmentImageRepository } from './shipment-image.repository';
export { ImageProcessingRepository } from './image-processing.repository';
export { CleanupTaskRepository } from './cleanup-task.repository';
export { EmailNotificationRepository } from './email-notification.repository';
export type { RecordNotificationInput } from './email-notification.repository';
