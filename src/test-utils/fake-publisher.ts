import { MessagePublisher } from '@/models/messaging';

export type FakePublisher = { [K in keyof MessagePublisher]: jest.MockedFunction<MessagePublisher[K]> };

export const createFakePublisher = (): FakePublisher => ({
    publish: jest.fn<ReturnType<MessagePublisher['publish']>, Parameters<MessagePublisher['publish']>>().mockResolvedValue('msg-generic'),
    publishWorkflowTrigger: jest.fn<ReturnType<MessagePublisher['publishWorkflowTrigger']>, Parameters<MessagePublisher['publishWorkflowTrigger']>>().mockResolvedValue('msg-trigger'),
    publishImagesReady: jest.fn<ReturnType<MessagePublisher['publishImagesReady']>, Parameters<MessagePublisher['publishImagesReady']>>().mockResolvedValue('msg-images'),
    publishEmailRequest: jest.fn<ReturnType<MessagePublisher['publishEmailRequest']>, Parameters<MessagePublisher['publishEmailRequest']>>().mockResolvedValue('msg-email'),
    publishError: jest.fn<ReturnType<MessagePublisher['publishError']>, Parameters<MessagePublisher['publishError']>>().mockResolvedValue('msg-error')
});
