export * from './shipment-image.interface';
export * from './shipment-image.model';
