import { isRecord, JsonRecord } from './guards';
import { ValidationError } from './errors';

/**
 * Normalises the body of an event delivery into its payload.
 *
 * Accepted shapes, checked in order: a Pub/Sub push envelope whose
 * `message.data` is base64 encoded JSON, a direct storage event carrying
 * `bucket` and `name`, and a CloudEvent with a `data` object. Anything else
 * is returned as is.
 */
export const extractEventData = (envelope: unknown): JsonRecord => {
    if (!isRecord(envelope)) {
        throw new ValidationError('Event body must be a JSON object');
    }

    const message = envelope.message;
    if (isRecord(message) && 'data' in message) {
        return decodePubSubData(message.data);
    }

    if ('bucket' in envelope && 'name' in envelope) {
        return envelope;
    }

    if (isRecord(envelope.data)) {
        return envelope.data;
    }

    return envelope;
};

export const decodePubSubData = (data: unknown): JsonRecord => {
    if (typeof data !== 'string' || data.length === 0) {
        throw new ValidationError('Pub/Sub message data must be a non-empty base64 string');
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(Buffer.from(data, 'base64').toString('utf8'));
    } catch (error) {
        throw new ValidationError(`Pub/Sub message data is not valid JSON: ${error instanceof Error ? error.message : 'parse error'}`);
    }

    if (!isRecord(parsed)) {
        throw new ValidationError('Pub/Sub message data must decode to a JSON object');
    }
    return parsed;
};

export const encodePubSubData = (payload: unknown): string =>
    Buffer.from(JSON.stringify(payload), 'utf8').toString('base64');
