import { Type } from '@google/genai';
import type { GenerateContentParameters, Schema } from '@google/genai';
import { DEFAULT_MAX_OUTPUT_TOKENS, DEFAULT_TEMPERATURE, STRUCTURED_OUTPUT_MODELS } from '@shared/constants';
import { ConfigurationError, GeminiError } from '@shared/errors';
import { extractFirstJsonObject, isPlainObject, toGeminiError, withTimeout } from '@shared/utils/retryLogic';
import type { LlmCall, LlmResponse } from '@shared/types';

/**
 * The slice of a Gemini response this client reads.
 */
export interface ModelResponse {
    candidates?: Array<{ content?: { parts?: Array<{ text?: string }> } }>;
    usageMetadata?: { promptTokenCount?: number; candidatesTokenCount?: number };
    modelVersion?: string;
}

export interface ContentModels {
    generateContent(params: GenerateContentParameters): Promise<ModelResponse>;
}

export interface GeminiLlmOptions {
    getModels: () => ContentModels;  // Resolved per call so a missing key surfaces as ConfigurationError
    model: string;
    temperature?: number;
    maxOutputTokens?: number;
    structuredOutput?: boolean;      // Defaults to whether the model is known to accept responseSchema
}

export function supportsStructuredOutput(model: string): boolean {
    return STRUCTURED_OUTPUT_MODELS.includes(model);
}

export function buildResponseSchema(fieldSchema: readonly string[]): Schema {
    const properties: Record<string, Schema> = {};
    fieldSchema.forEach(name => {
        properties[name] = { type: Type.STRING };
    });

    return {
        type: Type.OBJECT,
        properties,
        required: [...fieldSchema],
        propertyOrdering: [...fieldSchema]
    };
}

/**
 * Structured output parses directly; free text falls back to the first JSON object in it.
 */
export function parseFieldsFromText(text: string): Record<string, unknown> {
    try {
        const parsed: unknown = JSON.parse(text);
        if (isPlainObject(parsed)) return parsed;
    } catch {
        // Not bare JSON; look for an object inside the text
    }

    try {
        return extractFirstJsonObject(text);
    } catch (error: unknown) {
        throw new GeminiError('Failed to parse JSON from model response', 'MALFORMED_RESPONSE', true, {
            responseText: text.substring(0, 500),
            reason: error instanceof Error ? error.message : String(error)
        });
    }
}

export function createGeminiLlmCall(options: GeminiLlmOptions): LlmCall {
    const structured = options.structuredOutput ?? supportsStructuredOutput(options.model);

    return async (prompt, fieldSchema, timeoutMs): Promise<LlmResponse> => {
        const models = options.getModels();

        const params: GenerateContentParameters = {
            model: options.model,
            contents: [{ role: 'user', parts: [{ text: prompt }] }],
            config: {
                temperature: options.temperature ?? DEFAULT_TEMPERATURE,
                maxOutputTokens: options.maxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS,
                ...(structured
                    ? { responseMimeType: 'application/json', responseSchema: buildResponseSchema(fieldSchema) }
                    : {})
            }
        };

        let result: ModelResponse;
        try {
            result = await withTimeout(() => models.generateContent(params), timeoutMs);
        } catch (error: unknown) {
            if (error instanceof ConfigurationError) throw error;
            throw toGeminiError(error);
        }

        const text = result.candidates?.[0]?.content?.parts?.[0]?.text;
        if (!text || !text.trim()) {
            throw new GeminiError('Empty response from AI model', 'EMPTY_RESPONSE', true);
        }

        return {
            fields: parseFieldsFromText(text),
            usage: {
                prompt_tokens: result.usageMetadata?.promptTokenCount || 0,
                completion_tokens: result.usageMetadata?.candidatesTokenCount || 0
            },
            model: result.modelVersion || options.model
        };
    };
}
