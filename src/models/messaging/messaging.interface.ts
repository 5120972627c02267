export type TopicKey = 'fileProcessed' | 'imagesReady' | 'emailSend' | 'errors';

export type MessageType = 'workflow_trigger' | 'images_ready' | 'email_request' | 'processing_error';

export type ErrorSeverity = 'warning' | 'error' | 'critical';

export interface PublishAttributes {
    messageType: MessageType;
    processingUuid: string;
    severity?: ErrorSeverity;
}

export interface MessageAttributes extends PublishAttributes {
    sourceService: string;
    timestamp: string;
}

export interface WorkflowTriggerMessage {
    processingUuid: string;
    originalFile: string;
    packages: string[];
    totalShipments: number;
    packagesCreated: number;
}

export interface ImagesReadyMessage {
    processingUuid: string;
    packageName: string;
    zipObject: string;
    imagesProcessed: number;
}

export interface EmailRequestMessage {
    action: 'send_completion_email' | 'send_error_notification';
    processingUuid: string;
    packageName?: string;
    signedUrl?: string;
    signedUrls?: string[];
    downloadFilename?: string;
    expirationDatetime?: string;
    expirationHours?: number;
    fileSizeMb?: number;
    imagesProcessed?: number;
    imagesFailed?: number;
    compressionRatioPercent?: number;
    errorType?: string;
    errorMessage?: string;
}

export interface ProcessingErrorMessage {
    processingUuid: string;
    serviceOrigin: string;
    errorMessage: string;
    severity: ErrorSeverity;
    context?: Record<string, unknown>;
    stack?: string;
}

export interface MessagePublisher {
    publish(topic: TopicKey, payload: object, attributes: PublishAttributes): Promise<string>;
    publishWorkflowTrigger(message: WorkflowTriggerMessage): Promise<string>;
    publishImagesReady(message: ImagesReadyMessage): Promise<string>;
    publishEmailRequest(message: EmailRequestMessage): Promise<string>;
    publishError(message: Omit<ProcessingErrorMessage, 'serviceOrigin'>): Promise<string>;
}
