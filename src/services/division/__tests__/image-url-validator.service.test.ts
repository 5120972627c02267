import { AxiosError } from 'axios';
import {
    ERROR_CONNECTION,
    ERROR_INVALID_FORMAT,
    ERROR_MISSING_URL,
    extractImageUrl,
    hasValidUrlFormat,
    ImageUrlValidatorService
} from '../image-url-validator.service';

const headResponse = (status: number, headers: Record<string, string> = {}) => ({ status, headers, data: '' });

describe('image url helpers', () => {
    it('finds the url in known fields', () => {
        expect(extractImageUrl({ id: 1, imagen_url: ' https://img.test/a.jpg ' })).toBe('https://img.test/a.jpg');
        expect(extractImageUrl({ id: 1, producto: { image: 'https://img.test/b.png' } })).toBe('https://img.test/b.png');
        expect(extractImageUrl({ id: 1, image: '' })).toBeNull();
    });

    it('accepts only http and https urls', () => {
        expect(hasValidUrlFormat('https://img.test/a.jpg')).toBe(true);
        expect(hasValidUrlFormat('ftp://img.test/a.jpg')).toBe(false);
        expect(hasValidUrlFormat('not a url')).toBe(false);
    });
});

describe('ImageUrlValidatorService', () => {
    const head = jest.fn();
    const validator = new ImageUrlValidatorService({ timeoutMs: 10000, concurrency: 2 }, { head });

    beforeEach(() => {
        head.mockReset();
    });

    it('accepts an image response', async () => {
        head.mockResolvedValue(headResponse(200, { 'content-type': 'image/JPEG', 'content-length': '2048' }));

        await expect(validator.validateUrl('https://img.test/a.jpg')).resolves.toEqual({
            url: 'https://img.test/a.jpg',
            valid: true,
            error: null,
            statusCode: 200,
            contentType: 'image/jpeg',
            contentLength: 2048
        });
    });

    it('rejects missing and malformed urls without a request', async () => {
        expect((await validator.validateUrl(null)).error).toBe(ERROR_MISSING_URL);
        expect((await validator.validateUrl('img.test/a.jpg')).error).toBe(ERROR_INVALID_FORMAT);
        expect(head).not.toHaveBeenCalled();
    });

    it('reports bad status and content type', async () => {
        head.mockResolvedValueOnce(headResponse(404));
        head.mockResolvedValueOnce(headResponse(200, { 'content-type': 'text/html; charset=utf-8' }));

        expect((await validator.validateUrl('https://img.test/gone.jpg')).error).toBe('Invalid status code: 404');
        expect((await validator.validateUrl('https://img.test/page')).error).toBe('Content type is not an image: text/html; charset=utf-8');
    });

    it('maps request failures', async () => {
        head.mockRejectedValueOnce(new AxiosError('timeout of 10000ms exceeded', 'ECONNABORTED'));
        head.mockRejectedValueOnce(new AxiosError('getaddrinfo ENOTFOUND img.test', 'ENOTFOUND'));
        head.mockRejectedValueOnce(new AxiosError('socket hang up', 'ERR_BAD_RESPONSE'));

        expect((await validator.validateUrl('https://img.test/1.jpg')).error).toBe('Timeout after 10 seconds');
        expect((await validator.validateUrl('https://img.test/2.jpg')).error).toBe(ERROR_CONNECTION);
        expect((await validator.validateUrl('https://img.test/3.jpg')).error).toBe('Request error: socket hang up');
    });

    it('validates shipments in order and builds statistics', async () => {
        head.mockImplementation(async (url: string) => url.endsWith('.jpg')
            ? headResponse(200, { 'content-type': 'image/jpeg' })
            : headResponse(500));

        const results = await validator.validateShipments([
            { id: 1, imageUrl: 'https://img.test/1.jpg' },
            { id: 2 },
            { id: 3, imageUrl: 'https://img.test/3.gif' }
        ]);

        expect(results.map(result => [result.index, result.valid, result.error])).toEqual([
            [0, true, null],
            [1, false, ERROR_MISSING_URL],
            [2, false, 'Invalid status code: 500']
        ]);

        expect(validator.getStatistics(results)).toEqual({
            total: 3,
            valid: 1,
            invalid: 2,
            successPercentage: 33.33,
            errorsByType: { [ERROR_MISSING_URL]: 1, 'Invalid status code: 500': 1 },
            statusCodes: { '200': 1, '500': 1 },
            contentTypes: { image: 1 },
            recommendations: [
                'More than 50% of the image URLs are invalid. Review the data source.',
                'Some shipments have no image URL.',
                'Check that the image URLs are still online.'
            ]
        });
    });

    it('reports a clean run', () => {
        expect(validator.getStatistics([]).recommendations).toEqual(['All image URLs are valid.']);
    });
});
