import { GeminiError } from '../errors';
import { getErrorMessage, getErrorStatus } from './errorMessage';

/**
 * Races `fn` against a timer. The in-flight call is not cancelled; it simply stops
 * mattering once the timer wins.
 */
export async function withTimeout<T>(fn: () => Promise<T>, timeoutMs: number): Promise<T> {
    let timeoutId: ReturnType<typeof setTimeout> | undefined;

    const timeoutPromise = new Promise<never>((_, reject) => {
        timeoutId = setTimeout(
            () => reject(new GeminiError(`Request timed out after ${timeoutMs}ms`, 'TIMEOUT', true)),
            timeoutMs
        );
    });

    try {
        return await Promise.race([fn(), timeoutPromise]);
    } finally {
        if (timeoutId) clearTimeout(timeoutId);
    }
}

/**
 * Returns true for provider errors worth another attempt (load, 5xx, network).
 */
export function isRetryableStatus(status: number | undefined, message: string): boolean {
    const lower = message.toLowerCase();
    return status === 429 ||
        status === 500 ||
        status === 502 ||
        status === 503 ||
        status === 504 ||
        status === 408 ||
        lower.includes('network') ||
        lower.includes('timeout') ||
        lower.includes('econnreset');
}

/**
 * Normalises anything thrown by the provider SDK into a GeminiError.
 */
export function toGeminiError(error: unknown): GeminiError {
    if (error instanceof GeminiError) return error;

    const message = getErrorMessage(error);
    const status = getErrorStatus(error);
    return new GeminiError(message, status === 429 ? 'RATE_LIMIT' : 'API_ERROR', isRetryableStatus(status, message), {
        status
    });
}

// Helper to extract the first top-level JSON object from free text
export function extractFirstJsonObject(text: string): Record<string, unknown> {
    const cleanText = text.trim();

    const start = cleanText.indexOf('{');
    if (start === -1) {
        throw new Error("No JSON object found in response");
    }

    // Brace matching that ignores braces inside strings
    let openCount = 0;
    let endIndex = -1;
    let inString = false;
    let escape = false;

    for (let i = start; i < cleanText.length; i++) {
        const char = cleanText[i];

        if (escape) {
            escape = false;
            continue;
        }

        if (char === '\\') {
            escape = true;
            continue;
        }

        if (char === '"') {
            inString = !inString;
            continue;
        }

        if (!inString) {
            if (char === '{') {
                openCount++;
            } else if (char === '}') {
                openCount--;
                if (openCount === 0) {
                    endIndex = i;
                    break;
                }
            }
        }
    }

    if (endIndex === -1) {
        throw new Error("Found start of JSON object but could not find matching end brace");
    }

    const jsonString = cleanText.substring(start, endIndex + 1);

    let parsed: unknown;
    try {
        parsed = JSON.parse(jsonString);
    } catch {
        // Trailing commas are the usual culprit
        const sanitized = jsonString.replace(/,\s*([\]}])/g, '$1');
        try {
            parsed = JSON.parse(sanitized);
        } catch {
            throw new Error("Failed to parse extracted JSON object");
        }
    }

    if (!isPlainObject(parsed)) {
        throw new Error("Extracted JSON is not an object");
    }
    return parsed;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
