import { ValidationError } from './errors';

export interface GcsLocation {
    bucket: string;
    path: string;
}

const GCS_PREFIX = 'gs://';

export const isGcsUri = (value: string): boolean => value.startsWith(GCS_PREFIX);

export const parseGcsUri = (uri: string): GcsLocation => {
    if (!isGcsUri(uri)) {
        throw new ValidationError(`Not a gs:// URI: ${uri}`);
    }

    const rest = uri.slice(GCS_PREFIX.length);
    const slash = rest.indexOf('/');
    if (slash <= 0 || slash === rest.length - 1) {
        throw new ValidationError(`GCS URI must name a bucket and an object: ${uri}`);
    }

    return { bucket: rest.slice(0, slash), path: rest.slice(slash + 1) };
};

export const toGcsUri = (bucket: string, path: string): string => `${GCS_PREFIX}${bucket}/${path}`;

export const baseName = (path: string): string => {
    const parts = path.split('/');
    return parts[parts.length - 1] ?? path;
};
