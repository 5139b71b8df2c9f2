import type { IllustrationFamily } from '@shared/illustrations';
import { toVariantId } from '@shared/illustrations';
import { getCharacterCounts } from '@shared/utils/validation';
import type { ConstraintSpec, GeneratedContent, GenerationResult, TokenUsage, ValidationReport } from '@shared/types';

export interface SessionFields {
    presentation_id?: string | null;
    slide_id?: string | null;
    slide_number?: number | null;
}

export interface GenerationMetadata {
    illustration_type: string;
    variant_id: string;
    template_file: string;
    theme: string;
    topic: string;
    attempts: number;
    selected_attempt: number;
    generation_time_ms: number;
    model: string;
    usage: TokenUsage;
    [shapeField: string]: string | number | TokenUsage;
}

export interface GenerationResponseBody {
    success: true;
    html: string;
    infographic_html: string;
    metadata: GenerationMetadata;
    generated_content: GeneratedContent;
    character_counts: Record<string, number>;
    validation: ValidationReport;
    generation_time_ms: number;
    presentation_id: string | null;
    slide_id: string | null;
    slide_number: number | null;
}

export interface AssemblyInput {
    family: IllustrationFamily;
    variantShape: number;
    topic: string;
    spec: ConstraintSpec;
    result: GenerationResult;
    html: string;
    templateFile: string;
    themeName: string;
    session: SessionFields;
    startedAt: number;
}

/**
 * Shapes the JSON body the Layout Service consumes. Session fields are echoed untouched.
 */
export function buildGenerationResponse(input: AssemblyInput): GenerationResponseBody {
    const { family, variantShape, spec, result, session } = input;
    const generationTimeMs = Date.now() - input.startedAt;

    return {
        success: true,
        html: input.html,
        infographic_html: input.html,
        metadata: {
            illustration_type: family.type,
            variant_id: toVariantId(family.type, variantShape),
            [family.shapeField]: variantShape,
            template_file: input.templateFile,
            theme: input.themeName,
            topic: input.topic,
            attempts: result.attempts,
            selected_attempt: result.selectedAttempt,
            generation_time_ms: generationTimeMs,
            model: result.model,
            usage: result.usage
        },
        generated_content: result.content,
        character_counts: getCharacterCounts(result.content, spec),
        validation: result.validation,
        generation_time_ms: generationTimeMs,
        presentation_id: session.presentation_id ?? null,
        slide_id: session.slide_id ?? null,
        slide_number: session.slide_number ?? null
    };
}
