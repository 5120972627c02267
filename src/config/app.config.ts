export type ServiceName = 'division' | 'image-processing' | 'email';

const SERVICE_PORTS: Record<ServiceName, number> = {
    division: 8081,
    'image-processing': 8082,
    email: 8083
};

const isServiceName = (value: string): value is ServiceName =>
    Object.keys(SERVICE_PORTS).includes(value);

export const parseServiceName = (value: string | undefined): ServiceName => {
    const name = (value || 'division').trim();
    if (!isServiceName(name)) {
        throw new Error(`Unknown SERVICE_NAME "${name}". Expected one of: ${Object.keys(SERVICE_PORTS).join(', ')}`);
    }
    return name;
};

export const serviceOrigin = (name: ServiceName): string => `${name}-service`;

const serviceName = parseServiceName(process.env.SERVICE_NAME);

export const appConfig = {
    appName: process.env.APP_NAME || 'shipments-processing-platform',
    serviceName,
    port: parseInt(process.env.PORT || String(SERVICE_PORTS[serviceName]), 10),
    env: process.env.NODE_ENV || 'development',
    version: process.env.APP_VERSION || '2.0.0',
    projectId: process.env.GOOGLE_CLOUD_PROJECT || process.env.GCP_PROJECT_ID || '',
    region: process.env.GCP_REGION || 'us-central1',
    isCloudRun: Boolean(process.env.K_SERVICE),
    corsOrigins: (process.env.CORS_ORIGIN || '').split(',').map(origin => origin.trim()).filter(Boolean),
    bodyLimit: process.env.REQUEST_BODY_LIMIT || '10mb'
};

export type AppConfig = typeof appConfig;
