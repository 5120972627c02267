export interface IShipmentImage {
    id: number;
    shipmentId: string;
    imagePath: string;
    imageType: string;
    order: number;
    createdAt: Date;
}

export interface ImageRef {
    path: string;
    type: string;
    order: number;
}

export type ImagePathMap = Map<string, ImageRef[]>;
