import { promises as fs } from 'fs';
import path from 'path';
import { convert } from 'html-to-text';
import { logger, NotFoundError, ValidationError } from '@/utils';

export type TemplateData = Record<string, unknown>;

export interface RenderedTemplate {
    html: string;
    text: string;
}

export interface TemplateInfo {
    name: string;
    placeholders: string[];
    sizeBytes: number;
}

const TEMPLATE_NAME = /^[a-z0-9][a-z0-9_-]*$/i;
// {{{key}}} inserts raw HTML, {{key}} inserts an escaped value.
const PLACEHOLDER = /\{\{\{\s*([\w.]+)\s*\}\}\}|\{\{\s*([\w.]+)\s*\}\}/g;

const HTML_ESCAPES: Record<string, string> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
    "'": '&#39;'
};

export const escapeHtml = (value: string): string =>
    value.replace(/[&<>"']/g, char => HTML_ESCAPES[char] ?? char);

const stringify = (value: unknown): string => {
    if (value === undefined || value === null) return '';
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    return JSON.stringify(value);
};

export const renderTemplate = (source: string, data: TemplateData): string =>
    source.replace(PLACEHOLDER, (_match, rawKey: string | undefined, escapedKey: string | undefined) => {
        if (rawKey) {
            return stringify(data[rawKey]);
        }
        return escapeHtml(stringify(escapedKey ? data[escapedKey] : undefined));
    });

export const htmlToText = (html: string): string =>
    convert(html, {
        wordwrap: false,
        selectors: [
            { selector: 'h1', options: { uppercase: false } },
            { selector: 'h2', options: { uppercase: false } },
            { selector: 'a', options: { hideLinkHrefIfSameAsText: true } },
            { selector: 'img', format: 'skip' }
        ]
    })
        .replace(/\n{2,}/g, '\n')
        .trim();

export const listPlaceholders = (source: string): string[] => {
    const names = new Set<string>();
    for (const match of source.matchAll(PLACEHOLDER)) {
        const name = match[1] ?? match[2];
        if (name) names.add(name);
    }
    return [...names];
};

export class TemplateService {
    private readonly cache = new Map<string, string>();

    constructor(private readonly templatesDir: string) {}

    private async load(name: string): Promise<string> {
        if (!TEMPLATE_NAME.test(name)) {
            throw new ValidationError(`Invalid template name: ${name}`);
        }

        const cached = this.cache.get(name);
        if (cached !== undefined) {
            return cached;
        }

        try {
            const source = await fs.readFile(path.join(this.templatesDir, `${name}.html`), 'utf8');
            this.cache.set(name, source);
            return source;
        } catch (error) {
            logger.debug(`Template not readable: ${name}`, { error: error instanceof Error ? error.message : String(error) });
            throw new NotFoundError(`Template not found: ${name}`);
        }
    }

    async render(name: string, data: TemplateData): Promise<RenderedTemplate> {
        const html = renderTemplate(await this.load(name), data);
        return { html, text: htmlToText(html) };
    }

    async listTemplates(): Promise<TemplateInfo[]> {
        const entries = await fs.readdir(this.templatesDir);
        const names = entries
            .filter(entry => entry.endsWith('.html'))
            .map(entry => entry.slice(0, -'.html'.length))
            .filter(name => TEMPLATE_NAME.test(name))
            .sort();

        const infos: TemplateInfo[] = [];
        for (const name of names) {
            const source = await this.load(name);
            infos.push({ name, placeholders: listPlaceholders(source), sizeBytes: Buffer.byteLength(source, 'utf8') });
        }
        return infos;
    }

    async getTemplateInfo(name: string): Promise<TemplateInfo | null> {
        try {
            const source = await this.load(name);
            return { name, placeholders: listPlaceholders(source), sizeBytes: Buffer.byteLength(source, 'utf8') };
        } catch (error) {
            if (error instanceof NotFoundError) {
                return null;
            }
            throw error;
        }
    }
}
