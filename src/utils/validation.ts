import { z, ZodType } from 'zod';
import { ValidationError } from './errors';

export const storageEventSchema = z.object({
    bucket: z.string().min(1, 'bucket is required'),
    name: z.string().min(1, 'name is required')
}).passthrough();

export const validateImagesSchema = z.object({
    shipments: z.array(z.record(z.unknown())).min(1, 'shipments must not be empty')
});

export const fileStatisticsQuerySchema = z.object({
    bucket: z.string().min(1).optional(),
    name: z.string().min(1, 'name is required')
});

export const processPackageSchema = z.object({
    processingUuid: z.string().min(1, 'processingUuid is required'),
    packageUri: z.string().startsWith('gs://', 'packageUri must be a gs:// URI'),
    packageName: z.string().min(1).optional()
});

export const workflowTriggerSchema = z.object({
    processingUuid: z.string().min(1, 'processingUuid is required'),
    originalFile: z.string().optional(),
    packages: z.array(z.string().startsWith('gs://')).min(1, 'packages must not be empty'),
    totalShipments: z.number().int().nonnegative().optional(),
    packagesCreated: z.number().int().nonnegative().optional()
});

export const scheduleCleanupSchema = z.object({
    processingUuid: z.string().min(1, 'processingUuid is required'),
    cleanupAfterHours: z.number().positive().max(24 * 30).optional()
});

export const completionEmailSchema = z.object({
    processingUuid: z.string().min(1, 'processingUuid is required'),
    recipientEmail: z.string().email().optional(),
    signedUrl: z.string().optional(),
    signedUrls: z.array(z.string()).optional(),
    downloadFilename: z.string().optional(),
    imagesProcessed: z.number().nonnegative().optional(),
    imagesFailed: z.number().nonnegative().optional(),
    fileSizeMb: z.number().nonnegative().optional(),
    expirationHours: z.number().positive().optional(),
    expirationDatetime: z.string().optional(),
    compressionRatioPercent: z.number().optional(),
    packageName: z.string().optional()
});

export const errorNotificationSchema = z.object({
    errorType: z.string().min(1).default('processing_error'),
    errorMessage: z.string().min(1, 'errorMessage is required'),
    processingUuid: z.string().optional(),
    details: z.record(z.unknown()).optional()
});

export const customEmailSchema = z.object({
    toEmail: z.string().email('toEmail must be an email address'),
    subject: z.string().min(1, 'subject is required'),
    templateName: z.string().min(1).default('custom'),
    templateData: z.record(z.unknown()).default({})
});

export const testEmailSchema = z.object({
    toEmail: z.string().email('toEmail must be an email address')
});

export const statisticsQuerySchema = z.object({
    days: z.coerce.number().int().min(1).max(365).default(7)
});

export type ProcessPackageRequest = z.infer<typeof processPackageSchema>;
export type WorkflowTrigger = z.infer<typeof workflowTriggerSchema>;
export type CompletionEmailRequest = z.infer<typeof completionEmailSchema>;
export type ErrorNotificationRequest = z.infer<typeof errorNotificationSchema>;
export type CustomEmailRequest = z.infer<typeof customEmailSchema>;

export const parseWithSchema = <T>(schema: ZodType<T, z.ZodTypeDef, unknown>, value: unknown, label: string = 'request'): T => {
    const result = schema.safeParse(value);
    if (!result.success) {
        const details = result.error.issues.map(issue =>
            issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
        );
        throw new ValidationError(`Invalid ${label}`, details);
    }
    return result.data;
};
