import { Request, Response, Router } from 'express';
import { getErrorMessage, logger } from '@/utils';

export type DependencyCheck = () => Promise<string>;

export class HealthController {
    constructor(
        private readonly serviceName: string,
        private readonly version: string,
        private readonly dependencies: Record<string, DependencyCheck>,
        private readonly configuration: () => object
    ) {}

    public getHealth = async (_req: Request, res: Response): Promise<Response> => {
        return res.json({
            status: 'healthy',
            service: this.serviceName,
            version: this.version,
            timestamp: new Date().toISOString()
        });
    };

    public getStatus = async (_req: Request, res: Response): Promise<Response> => {
        try {
            const dependencies: Record<string, string> = {};
            for (const [name, check] of Object.entries(this.dependencies)) {
                dependencies[name] = await this.runCheck(name, check);
            }

            return res.json({
                service: this.serviceName,
                version: this.version,
                status: 'ready',
                dependencies,
                configuration: this.configuration(),
                timestamp: new Date().toISOString()
            });
        } catch (error) {
            logger.error('Status check failed', error);
            return res.status(500).json({
                service: this.serviceName,
                status: 'error',
                error: getErrorMessage(error),
                timestamp: new Date().toISOString()
            });
        }
    };

    private async runCheck(name: string, check: DependencyCheck): Promise<string> {
        try {
            return await check();
        } catch (error) {
            logger.warn(`Dependency check failed: ${name}`, { error: getErrorMessage(error) });
            return `error: ${getErrorMessage(error)}`;
        }
    }

    public getRoutes(): Router {
        const router = Router();

        router.get('/health', this.getHealth);
        router.get('/status', this.getStatus);

        return router;
    }
}
