import { Logger } from '../logger';

describe('Logger', () => {
    const cloudRunService = process.env.K_SERVICE;

    afterEach(() => {
        if (cloudRunService === undefined) {
            delete process.env.K_SERVICE;
        } else {
            process.env.K_SERVICE = cloudRunService;
        }
        jest.restoreAllMocks();
    });

    it('writes structured entries with service and version at the top level', () => {
        process.env.K_SERVICE = 'division-service';
        const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);

        new Logger('info', { service: 'division', version: '2.1.0' })
            .child({ traceId: 'trace-1', processingUuid: 'p-1' })
            .info('Division started', { packages: 2 });

        expect(log).toHaveBeenCalledTimes(1);
        const entry: unknown = JSON.parse(String(log.mock.calls[0][0]));
        expect(entry).toEqual({
            severity: 'INFO',
            message: 'Division started',
            timestamp: expect.any(String),
            service: 'division',
            version: '2.1.0',
            traceId: 'trace-1',
            context: { processingUuid: 'p-1', packages: 2 }
        });
    });

    it('skips entries below the configured level', () => {
        process.env.K_SERVICE = 'division-service';
        const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);

        new Logger('info', { service: 'email', version: '2.0.0' }).debug('Template cache hit');

        expect(log).not.toHaveBeenCalled();
    });
});
