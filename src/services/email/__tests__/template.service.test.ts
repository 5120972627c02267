import path from 'path';
import { NotFoundError, ValidationError } from '@/utils';
import { escapeHtml, htmlToText, listPlaceholders, renderTemplate, TemplateService } from '../template.service';

const TEMPLATES_DIR = path.resolve(__dirname, '../../../../templates');

describe('template helpers', () => {
    it('escapes double-brace values and inserts triple-brace values as is', () => {
        expect(renderTemplate('<p>{{ name }}</p>{{{links}}}<span>{{count}}{{missing}}</span>', {
            name: 'Tom & <Jerry>',
            links: '<ul><li>x</li></ul>',
            count: 3
        })).toBe('<p>Tom &amp; &lt;Jerry&gt;</p><ul><li>x</li></ul><span>3</span>');
    });

    it('escapes quotes', () => {
        expect(escapeHtml(`"a" 'b'`)).toBe('&quot;a&quot; &#39;b&#39;');
    });

    it('converts html to plain text lines', () => {
        const html = '<html><head><title>Ignored</title></head><body><h2>Hello</h2><p>A &amp; B<br>next</p></body></html>';

        expect(htmlToText(html)).toBe('Hello\nA & B\nnext');
    });

    it('lists each placeholder once', () => {
        expect(listPlaceholders('{{a}} {{{b}}} {{ a }}')).toEqual(['a', 'b']);
    });
});

describe('TemplateService', () => {
    const service = new TemplateService(TEMPLATES_DIR);

    it('lists the bundled templates', async () => {
        const templates = await service.listTemplates();

        expect(templates.map(template => template.name)).toEqual(['completion', 'custom', 'error', 'test']);
    });

    it('describes a template', async () => {
        const info = await service.getTemplateInfo('custom');

        expect(info?.placeholders).toEqual(['title', 'message']);
        expect(info?.sizeBytes).toBeGreaterThan(0);
    });

    it('returns null for unknown templates and rejects unsafe names', async () => {
        await expect(service.getTemplateInfo('missing')).resolves.toBeNull();
        await expect(service.getTemplateInfo('../secrets')).rejects.toBeInstanceOf(ValidationError);
        await expect(service.render('missing', {})).rejects.toBeInstanceOf(NotFoundError);
    });

    it('renders html and text bodies', async () => {
        const rendered = await service.render('custom', { title: 'Hi & bye', message: 'Body' });

        expect(rendered.html).toContain('<h2>Hi &amp; bye</h2>');
        expect(rendered.text).toBe('Hi & bye\nBody');
    });

    it('keeps the download link in the text body', async () => {
        const signedUrl = 'https://storage.googleapis.com/images-temp/u/u_1_of_1_images.zip?X-Goog-Signature=abc';

        const rendered = await service.render('completion', { processingUuid: 'u', signedUrl, additionalLinks: '' });

        expect(rendered.html).toContain(`<a href="${signedUrl}"`);
        expect(rendered.text).toContain(`Download images [${signedUrl}]`);
    });
});
