import { promises as fs } from 'fs';
import * as path from 'path';
import { PLACEHOLDER_PATTERN } from '@shared/constants';
import { ConfigurationError, NotFoundError } from '@shared/errors';
import { isIllustrationType, toVariantId } from '@shared/illustrations';
import type { GeneratedContent, IllustrationType, ThemeColors } from '@shared/types';
import { ReadThroughCache } from '../utils/readThroughCache';

export interface Template {
    illustrationType: IllustrationType;
    variantShape: number;
    file: string;            // Relative to the templates directory, e.g. "pyramid/4.html"
    html: string;
    placeholders: string[];  // Distinct names in order of first appearance
}

export interface FillOutcome {
    html: string;
    unresolved: string[];    // Placeholders with no content or theme value (removed)
    swept: string[];         // Tokens still present after substitution (removed)
}

type TemplateKey = `${IllustrationType}/${number}`;

const FRAGMENT_VIOLATIONS: Array<[RegExp, string]> = [
    [/<!doctype/i, 'doctype declaration'],
    [/<html[\s>]/i, '<html> wrapper'],
    [/<head[\s>]/i, '<head> section'],
    [/<body[\s>]/i, '<body> wrapper'],
    [/<style[\s>]/i, '<style> block']
];

/**
 * Lists what keeps `html` from being an embeddable fragment with inline styles only.
 */
export function findFragmentViolations(html: string): string[] {
    return FRAGMENT_VIOLATIONS.filter(([pattern]) => pattern.test(html)).map(([, label]) => label);
}

export function listPlaceholders(html: string): string[] {
    const names = new Set<string>();
    for (const match of html.matchAll(PLACEHOLDER_PATTERN)) {
        names.add(match[1]);
    }
    return [...names];
}

export async function readTemplate(dataDir: string, type: IllustrationType, variantShape: number): Promise<Template> {
    const file = `${type}/${variantShape}.html`;
    const filePath = path.join(dataDir, 'templates', type, `${variantShape}.html`);

    let html: string;
    try {
        html = await fs.readFile(filePath, 'utf-8');
    } catch {
        throw new NotFoundError('template', toVariantId(type, variantShape));
    }

    const violations = findFragmentViolations(html);
    if (violations.length > 0) {
        throw new ConfigurationError(`Template ${file} is not an embeddable fragment`, { violations });
    }

    console.log(`[TEMPLATE] Cached ${file}`);
    return { illustrationType: type, variantShape, file, html, placeholders: listPlaceholders(html) };
}

const hasOwn = (record: Record<string, string>, key: string): boolean =>
    Object.prototype.hasOwnProperty.call(record, key);

/**
 * Single lookup pass over the template's placeholders: content first, then theme.
 * Anything left unresolved is dropped, never shown.
 */
export function fillTemplate(template: Template, content: GeneratedContent, theme: ThemeColors): FillOutcome {
    const unresolved = new Set<string>();

    const filled = template.html.replace(PLACEHOLDER_PATTERN, (_token: string, name: string) => {
        if (hasOwn(content, name)) return content[name];
        if (hasOwn(theme, name)) return theme[name];
        unresolved.add(name);
        return '';
    });

    // Post-condition: no {identifier} token survives, even one that arrived inside a value
    const swept = filled.match(PLACEHOLDER_PATTERN) ?? [];
    const html = swept.length > 0 ? filled.replace(PLACEHOLDER_PATTERN, '') : filled;

    return { html, unresolved: [...unresolved], swept };
}

export class TemplateStore {
    constructor(
        dataDir: string,
        private readonly cache = new ReadThroughCache<TemplateKey, Template>(key => {
            const [type, shape] = key.split('/');
            if (!isIllustrationType(type)) {
                return Promise.reject(new NotFoundError('template', key));
            }
            return readTemplate(dataDir, type, Number(shape));
        })
    ) {}

    async load(type: IllustrationType, variantShape: number): Promise<Template> {
        if (!Number.isInteger(variantShape) || variantShape < 1) {
            throw new NotFoundError('template', toVariantId(type, variantShape));
        }
        return this.cache.get(`${type}/${variantShape}`);
    }
}

export class TemplateFiller {
    constructor(private readonly templates: TemplateStore) {}

    /**
     * Loads the template ahead of generation so a missing one fails before any LLM call.
     */
    async prepare(type: IllustrationType, variantShape: number): Promise<Template> {
        return this.templates.load(type, variantShape);
    }

    async fill(
        type: IllustrationType,
        variantShape: number,
        content: GeneratedContent,
        theme: ThemeColors
    ): Promise<FillOutcome & { template: Template }> {
        const template = await this.templates.load(type, variantShape);
        const outcome = fillTemplate(template, content, theme);

        if (outcome.unresolved.length > 0) {
            console.warn(`[TEMPLATE] ${template.file}: removed unfilled placeholders ${outcome.unresolved.join(', ')}`);
        }
        if (outcome.swept.length > 0) {
            console.warn(`[TEMPLATE] ${template.file}: swept ${outcome.swept.length} leftover token(s) after fill`);
        }
        return { ...outcome, template };
    }
}
