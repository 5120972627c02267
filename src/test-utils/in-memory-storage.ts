import { SignedUrlOptions, StorageGateway, StoredFileInfo, UploadOptions } from '@/models/storage';
import { toGcsUri } from '@/utils';

interface StoredObject {
    content: Buffer;
    contentType: string;
    metadata: Record<string, string>;
}

/**
 * Map backed stand-in for Cloud Storage used by the service tests.
 */
export class InMemoryStorage implements StorageGateway {
    readonly objects = new Map<string, StoredObject>();
    readonly deleted: string[] = [];
    readonly signedUrlRequests: Array<{ bucket: string; name: string; options: SignedUrlOptions }> = [];

    private key(bucket: string, name: string): string {
        return toGcsUri(bucket, name);
    }

    put(bucket: string, name: string, content: Buffer | string, contentType: string = 'application/octet-stream'): void {
        this.objects.set(this.key(bucket, name), {
            content: typeof content === 'string' ? Buffer.from(content, 'utf8') : content,
            contentType,
            metadata: {}
        });
    }

    putJson(bucket: string, name: string, data: unknown): void {
        this.put(bucket, name, JSON.stringify(data), 'application/json');
    }

    get(bucket: string, name: string): StoredObject | undefined {
        return this.objects.get(this.key(bucket, name));
    }

    keys(): string[] {
        return [...this.objects.keys()];
    }

    private require(bucket: string, name: string): StoredObject {
        const object = this.get(bucket, name);
        if (!object) {
            throw new Error(`No such object: ${this.key(bucket, name)}`);
        }
        return object;
    }

    async readJson(bucket: string, name: string): Promise<unknown> {
        return JSON.parse(this.require(bucket, name).content.toString('utf8'));
    }

    async writeJson(bucket: string, name: string, data: unknown, metadata: Record<string, string> = {}): Promise<string> {
        this.objects.set(this.key(bucket, name), {
            content: Buffer.from(JSON.stringify(data, null, 2), 'utf8'),
            contentType: 'application/json',
            metadata
        });
        return this.key(bucket, name);
    }

    async exists(bucket: string, name: string): Promise<boolean> {
        return this.objects.has(this.key(bucket, name));
    }

    async getSize(bucket: string, name: string): Promise<number | null> {
        const object = this.get(bucket, name);
        return object ? object.content.length : null;
    }

    async download(bucket: string, name: string): Promise<Buffer> {
        return this.require(bucket, name).content;
    }

    async upload(bucket: string, name: string, content: Buffer, options: UploadOptions): Promise<number> {
        this.objects.set(this.key(bucket, name), {
            content,
            contentType: options.contentType,
            metadata: options.metadata ?? {}
        });
        return content.length;
    }

    async delete(bucket: string, name: string): Promise<void> {
        this.require(bucket, name);
        this.objects.delete(this.key(bucket, name));
        this.deleted.push(this.key(bucket, name));
    }

    async listFiles(bucket: string, prefix: string): Promise<StoredFileInfo[]> {
        const bucketPrefix = this.key(bucket, '');
        return [...this.objects.entries()]
            .filter(([key]) => key.startsWith(bucketPrefix + prefix))
            .map(([key, object]) => ({ name: key.slice(bucketPrefix.length), size: object.content.length }));
    }

    async getSignedReadUrl(bucket: string, name: string, options: SignedUrlOptions): Promise<string> {
        this.signedUrlRequests.push({ bucket, name, options });
        return `https://storage.test/${bucket}/${name}?X-Goog-Signature=test`;
    }
}
