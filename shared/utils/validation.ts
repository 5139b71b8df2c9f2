import { EXCERPT_LENGTH } from '../constants';
import type { ConstraintSpec, ConstraintViolation, GeneratedContent, ValidationReport } from '../types';

const TAG_PATTERN = /<[^>]*>/g;

/**
 * Removes inline markup (<strong>, <br>, ...) so only visible text remains.
 */
export function stripEmphasisTags(text: string): string {
    return text.replace(TAG_PATTERN, '');
}

/**
 * Visible length in code points, so an emoji or accented letter counts once.
 */
export function countVisibleCharacters(text: string): number {
    return Array.from(stripEmphasisTags(text)).length;
}

function toExcerpt(value: string): string {
    const codePoints = Array.from(value);
    return codePoints.length > EXCERPT_LENGTH ? `${codePoints.slice(0, EXCERPT_LENGTH).join('')}...` : value;
}

export function validateContent(content: GeneratedContent, spec: ConstraintSpec): ValidationReport {
    const violations: ConstraintViolation[] = [];

    spec.fields.forEach(({ name, min, max }) => {
        const value = content[name] ?? '';
        const length = countVisibleCharacters(value);

        if (length < min || length > max) {
            violations.push({
                field: name,
                actual_length: length,
                min,
                max,
                direction: length < min ? 'under' : 'over',
                excerpt: toExcerpt(value)
            });
        }
    });

    return { valid: violations.length === 0, violations };
}

export function getCharacterCounts(content: GeneratedContent, spec: ConstraintSpec): Record<string, number> {
    const counts: Record<string, number> = {};
    spec.fields.forEach(({ name }) => {
        counts[name] = countVisibleCharacters(content[name] ?? '');
    });
    return counts;
}

/**
 * One-line-per-violation summary for logs.
 */
export function formatValidationReport(report: ValidationReport): string {
    if (report.valid) {
        return 'All content meets character constraints';
    }

    const lines = report.violations.map((v, i) =>
        `${i + 1}. ${v.field}: ${v.actual_length} chars (${v.direction.toUpperCase()}, allowed ${v.min}-${v.max}) "${v.excerpt}"`
    );
    return `Found ${report.violations.length} constraint violation(s):\n${lines.join('\n')}`;
}
