import { StorageGateway } from '@/models/storage';
import { logger, sleep, toGcsUri } from '@/utils';

export interface FileCompletionOptions {
    timeoutMs: number;
    pollMs: number;
    stableChecks?: number;
    traceId?: string;
}

/**
 * Polls the object size until it stays the same, and above zero, for
 * `stableChecks` consecutive reads. Returns false once `timeoutMs` elapses.
 */
export const waitForFileCompletion = async (
    storage: StorageGateway,
    bucket: string,
    name: string,
    options: FileCompletionOptions
): Promise<boolean> => {
    const requiredChecks = options.stableChecks ?? 3;
    const startedAt = Date.now();
    let previousSize = -1;
    let stableCount = 0;

    logger.info(`Waiting for upload to finish: ${toGcsUri(bucket, name)}`, {
        traceId: options.traceId,
        timeoutMs: options.timeoutMs
    });

    while (Date.now() - startedAt < options.timeoutMs) {
        const size = await storage.getSize(bucket, name);

        if (size !== null) {
            if (size === previousSize && size > 0) {
                stableCount++;
                if (stableCount >= requiredChecks) {
                    logger.info('File is complete and stable', { traceId: options.traceId, sizeBytes: size });
                    return true;
                }
            } else {
                stableCount = 0;
            }
            previousSize = size;
        }

        await sleep(options.pollMs);
    }

    logger.warn(`Timed out waiting for ${toGcsUri(bucket, name)}`, { traceId: options.traceId, lastSize: previousSize });
    return false;
};
