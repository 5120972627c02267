export { logger, Logger } from './logger';
export type { LogContext, LogLevel } from './logger';
export { ResponseUtils } from './response-utils';
export { RequestLogger } from './request-logger';
export { JWTUtils } from './jwt-utils';
export { AppError, ValidationError, NotFoundError, FileNotReadyError, getErrorMessage } from './errors';
export { isRecord, roundTo } from './guards';
export type { JsonRecord } from './guards';
export { extractEventData, decodePubSubData, encodePubSubData } from './event-envelope';
export { parseGcsUri, toGcsUri, isGcsUri, baseName } from './gcs-uri';
export type { GcsLocation } from './gcs-uri';
export { mapWithConcurrency, sleep } from './concurrency';
