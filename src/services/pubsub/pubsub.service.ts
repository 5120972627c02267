import { TopicConfig } from '@/config/pipeline.config';
import {
    EmailRequestMessage,
    ImagesReadyMessage,
    MessageAttributes,
    MessagePublisher,
    ProcessingErrorMessage,
    PublishAttributes,
    TopicKey,
    WorkflowTriggerMessage
} from '@/models/messaging';
import { encodePubSubData, logger } from '@/utils';
import { GoogleApiClient } from '../gcp/google-api.client';

interface PublishResponse {
    messageIds?: string[];
}

export class PubSubService implements MessagePublisher {
    constructor(
        private readonly client: GoogleApiClient,
        private readonly projectId: string,
        private readonly topics: TopicConfig,
        private readonly sourceService: string
    ) {}

    private topicPath(topic: TopicKey): string {
        const topicName = this.topics[topic];
        if (!topicName) {
            throw new Error(`Unknown topic: ${topic}`);
        }
        return `projects/${this.projectId}/topics/${topicName}`;
    }

    async publish(
        topic: TopicKey,
        payload: object,
        attributes: PublishAttributes
    ): Promise<string> {
        if (!this.projectId) {
            throw new Error('GOOGLE_CLOUD_PROJECT is not configured');
        }

        const path = this.topicPath(topic);
        const messageAttributes: MessageAttributes = {
            ...attributes,
            sourceService: this.sourceService,
            timestamp: new Date().toISOString()
        };

        const response = await this.client.post<PublishResponse>(
            `https://pubsub.googleapis.com/v1/${path}:publish`,
            { messages: [{ data: encodePubSubData(payload), attributes: messageAttributes }] }
        );

        const messageId = response.messageIds?.[0];
        if (!messageId) {
            throw new Error(`Publish to ${path} returned no message id`);
        }

        logger.info(`Message published to ${this.topics[topic]}`, {
            messageId,
            messageType: attributes.messageType,
            traceId: attributes.processingUuid
        });
        return messageId;
    }

    publishWorkflowTrigger(message: WorkflowTriggerMessage): Promise<string> {
        return this.publish('fileProcessed', message, {
            messageType: 'workflow_trigger',
            processingUuid: message.processingUuid
        });
    }

    publishImagesReady(message: ImagesReadyMessage): Promise<string> {
        return this.publish('imagesReady', message, {
            messageType: 'images_ready',
            processingUuid: message.processingUuid
        });
    }

    publishEmailRequest(message: EmailRequestMessage): Promise<string> {
        return this.publish('emailSend', message, {
            messageType: 'email_request',
            processingUuid: message.processingUuid
        });
    }

    publishError(message: Omit<ProcessingErrorMessage, 'serviceOrigin'>): Promise<string> {
        const payload: ProcessingErrorMessage = { ...message, serviceOrigin: this.sourceService };
        return this.publish('errors', payload, {
            messageType: 'processing_error',
            processingUuid: message.processingUuid,
            severity: message.severity
        });
    }
}

/**
 * Publishes an error report without letting a publishing failure replace the original error.
 */
export const reportProcessingError = async (
    publisher: MessagePublisher,
    message: Omit<ProcessingErrorMessage, 'serviceOrigin'>
): Promise<void> => {
    try {
        await publisher.publishError(message);
    } catch (publishError) {
        logger.error('Failed to publish processing error', publishError, { traceId: message.processingUuid });
    }
};
