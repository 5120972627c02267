export interface InternalAuthConfig {
    secret: string;
    issuer?: string;
}

export const internalAuthConfig: InternalAuthConfig = {
    secret: process.env.INTERNAL_JWT_SECRET || '',
    issuer: process.env.INTERNAL_JWT_ISSUER || undefined
};
