import { TasksConfig } from '@/config/pipeline.config';
import { InternalAuthConfig } from '@/config/auth.config';
import { JWTUtils, logger } from '@/utils';
import { GoogleApiClient } from './google-api.client';

interface CreatedTask {
    name?: string;
}

const TOKEN_GRACE_SECONDS = 3600;

export interface HttpTaskRequest {
    path: string;
    body: unknown;
    scheduleTime: Date;
}

export class CloudTasksService {
    constructor(
        private readonly client: GoogleApiClient,
        private readonly projectId: string,
        private readonly config: TasksConfig,
        private readonly internalAuth: InternalAuthConfig = { secret: '' }
    ) {}

    isEnabled(): boolean {
        return Boolean(this.projectId && this.config.queue && this.config.handlerBaseUrl);
    }

    async enqueueHttpTask(request: HttpTaskRequest): Promise<string> {
        if (!this.isEnabled()) {
            throw new Error('Cloud Tasks queue is not configured');
        }

        const url = `${this.config.handlerBaseUrl.replace(/\/$/, '')}${request.path}`;
        const body = {
            task: {
                scheduleTime: request.scheduleTime.toISOString(),
                httpRequest: {
                    httpMethod: 'POST',
                    url,
                    headers: { 'Content-Type': 'application/json', ...this.authorizationHeader(request.scheduleTime) },
                    body: Buffer.from(JSON.stringify(request.body)).toString('base64'),
                    ...this.oidcToken()
                }
            }
        };

        const endpoint = `https://cloudtasks.googleapis.com/v2/projects/${this.projectId}/locations/${this.config.location}/queues/${this.config.queue}/tasks`;
        const task = await this.client.post<CreatedTask>(endpoint, body);

        logger.info('Cloud task created', { task: task.name, url, scheduleTime: body.task.scheduleTime });
        return task.name ?? '';
    }

    // Cloud Tasks replaces the Authorization header when an OIDC token is attached, so only one of the two is sent.
    private authorizationHeader(scheduleTime: Date): Record<string, string> {
        if (!this.internalAuth.secret) {
            return {};
        }
        const expiresInSeconds = Math.max(0, Math.ceil((scheduleTime.getTime() - Date.now()) / 1000)) + TOKEN_GRACE_SECONDS;
        const token = JWTUtils.signInternalToken(this.internalAuth.secret, this.internalAuth.issuer ?? 'cloud-tasks', 'cleanup-task', expiresInSeconds);
        return { Authorization: `Bearer ${token}` };
    }

    private oidcToken(): { oidcToken?: { serviceAccountEmail: string; audience: string } } {
        if (this.internalAuth.secret || !this.config.serviceAccountEmail) {
            return {};
        }
        return { oidcToken: { serviceAccountEmail: this.config.serviceAccountEmail, audience: this.config.handlerBaseUrl } };
    }
}
