import { Storage } from '@google-cloud/storage';
import { SignedUrlOptions, StorageGateway, StoredFileInfo, UploadOptions } from '@/models/storage';
import { logger, toGcsUri } from '@/utils';

const toSize = (value: string | number | undefined): number => {
    if (value === undefined) return 0;
    const size = typeof value === 'number' ? value : parseInt(value, 10);
    return Number.isNaN(size) ? 0 : size;
};

export class CloudStorageService implements StorageGateway {
    private readonly storage: Storage;

    constructor(projectId?: string, storage?: Storage) {
        this.storage = storage ?? new Storage(projectId ? { projectId } : {});
    }

    async readJson(bucket: string, name: string): Promise<unknown> {
        try {
            const [content] = await this.storage.bucket(bucket).file(name).download();
            return JSON.parse(content.toString('utf8'));
        } catch (error) {
            logger.error(`Failed to read JSON from ${toGcsUri(bucket, name)}`, error);
            throw error;
        }
    }

    async writeJson(bucket: string, name: string, data: unknown, metadata: Record<string, string> = {}): Promise<string> {
        try {
            await this.storage.bucket(bucket).file(name).save(JSON.stringify(data, null, 2), {
                contentType: 'application/json; charset=utf-8',
                resumable: false,
                metadata: { metadata }
            });
            return toGcsUri(bucket, name);
        } catch (error) {
            logger.error(`Failed to write JSON to ${toGcsUri(bucket, name)}`, error);
            throw error;
        }
    }

    async exists(bucket: string, name: string): Promise<boolean> {
        const [exists] = await this.storage.bucket(bucket).file(name).exists();
        return exists;
    }

    async getSize(bucket: string, name: string): Promise<number | null> {
        const file = this.storage.bucket(bucket).file(name);
        const [exists] = await file.exists();
        if (!exists) {
            return null;
        }
        const [metadata] = await file.getMetadata();
        return toSize(metadata.size);
    }

    async download(bucket: string, name: string): Promise<Buffer> {
        const [content] = await this.storage.bucket(bucket).file(name).download();
        return content;
    }

    async upload(bucket: string, name: string, content: Buffer, options: UploadOptions): Promise<number> {
        const file = this.storage.bucket(bucket).file(name);
        await file.save(content, {
            contentType: options.contentType,
            resumable: false,
            metadata: { metadata: options.metadata ?? {} }
        });
        const [metadata] = await file.getMetadata();
        return toSize(metadata.size);
    }

    async delete(bucket: string, name: string): Promise<void> {
        await this.storage.bucket(bucket).file(name).delete({ ignoreNotFound: true });
    }

    async listFiles(bucket: string, prefix: string): Promise<StoredFileInfo[]> {
        const [files] = await this.storage.bucket(bucket).getFiles({ prefix });
        return files.map(file => ({ name: file.name, size: toSize(file.metadata.size) }));
    }

    async getSignedReadUrl(bucket: string, name: string, options: SignedUrlOptions): Promise<string> {
        const [url] = await this.storage.bucket(bucket).file(name).getSignedUrl({
            version: 'v4',
            action: 'read',
            expires: options.expiresAt,
            ...(options.responseDisposition ? { responseDisposition: options.responseDisposition } : {})
        });
        return url;
    }
}
