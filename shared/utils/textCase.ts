import type { GeneratedContent } from '../types';

const SMALL_WORDS = new Set([
    'a', 'an', 'and', 'as', 'at', 'but', 'by', 'for', 'in',
    'of', 'on', 'or', 'the', 'to', 'with', 'via', 'vs', 'nor'
]);

const LINE_BREAK_SPLIT = /(<br\s*\/?>)/gi;
const LINE_BREAK = /^<br\s*\/?>$/i;

function capitalize(word: string): string {
    return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

/**
 * "CORE OF THE BUSINESS" -> "Core of the Business". Small words stay lowercase
 * unless they open a line; <br> tags are kept and start a new line.
 */
export function toTitleCase(text: string): string {
    let atLineStart = true;

    return text.split(LINE_BREAK_SPLIT).map(part => {
        if (LINE_BREAK.test(part)) {
            atLineStart = true;
            return part;
        }

        const words = part.split(/\s+/).filter(Boolean);
        const cased = words.map((word, index) => {
            const lower = word.toLowerCase();
            return (index === 0 && atLineStart) || !SMALL_WORDS.has(lower) ? capitalize(word) : lower;
        });
        if (words.length > 0) atLineStart = false;
        return cased.join(' ');
    }).join('');
}

export function applyTitleCase(content: GeneratedContent, fields: readonly string[]): GeneratedContent {
    const result: GeneratedContent = { ...content };
    for (const field of fields) {
        const value = result[field];
        if (value) result[field] = toTitleCase(value);
    }
    return result;
}
