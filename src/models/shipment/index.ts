export * from './shipment.interface';
