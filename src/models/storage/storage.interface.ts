export interface StoredFileInfo {
    name: string;
    size: number;
}

export interface UploadOptions {
    contentType: string;
    metadata?: Record<string, string>;
}

export interface SignedUrlOptions {
    expiresAt: Date;
    responseDisposition?: string;
}

export interface StorageGateway {
    readJson(bucket: string, name: string): Promise<unknown>;
    writeJson(bucket: string, name: string, data: unknown, metadata?: Record<string, string>): Promise<string>;
    exists(bucket: string, name: string): Promise<boolean>;
    getSize(bucket: string, name: string): Promise<number | null>;
    download(bucket: string, name: string): Promise<Buffer>;
    upload(bucket: string, name: string, content: Buffer, options: UploadOptions): Promise<number>;
    delete(bucket: string, name: string): Promise<void>;
    listFiles(bucket: string, prefix: string): Promise<StoredFileInfo[]>;
    getSignedReadUrl(bucket: string, name: string, options: SignedUrlOptions): Promise<string>;
}
