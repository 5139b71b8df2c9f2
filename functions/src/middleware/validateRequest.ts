import { generationBodySchema, formatZodIssues, variantShapeSchema, type GenerationBody } from '@shared/schemas';
import type { IllustrationFamily } from '@shared/illustrations';
import { isPlainObject } from '@shared/utils/retryLogic';
import { RequestValidationError } from '@shared/errors';

export interface ParsedGenerationRequest {
    variantShape: number;
    body: GenerationBody;
}

/**
 * Validates a generate body for one family, including its family-specific shape field.
 */
export function parseGenerationBody(family: IllustrationFamily, raw: unknown): ParsedGenerationRequest {
    if (!isPlainObject(raw)) {
        throw new RequestValidationError('Request body must be a JSON object');
    }

    const issues: string[] = [];

    const shape = variantShapeSchema(family).safeParse(raw[family.shapeField]);
    if (!shape.success) {
        issues.push(...formatZodIssues(shape.error).map(issue => `${family.shapeField}: ${issue}`));
    }

    const body = generationBodySchema.safeParse(raw);
    if (!body.success) {
        issues.push(...formatZodIssues(body.error));
    }

    if (!shape.success || !body.success) {
        throw new RequestValidationError(`Invalid ${family.displayName.toLowerCase()} request`, issues);
    }

    return { variantShape: shape.data, body: body.data };
}
