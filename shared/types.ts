export type IllustrationType = 'pyramid' | 'funnel' | 'concentric_circles' | 'round_table';

/**
 * Inclusive character range for a single generated field.
 */
export interface FieldConstraint {
    name: string;
    min: number;
    max: number;
}

/**
 * Per-variant character constraints (e.g. "pyramid_4").
 * Loaded from static data and never mutated after load.
 */
export interface ConstraintSpec {
    variantId: string;
    fields: readonly FieldConstraint[];       // Required output fields, in prompt order
    optionalFields: readonly FieldConstraint[]; // Only generated on request (e.g. pyramid overview)
    goldenExample: Readonly<Record<string, string>>;
}

export interface PreviousSlide {
    slide_number: number;
    slide_title: string;
    summary?: string;
}

export interface NarrativeContext {
    presentation_title?: string;
    slide_purpose?: string;
    key_message?: string;
    industry?: string;
    previous_slides: PreviousSlide[];
}

export interface GenerationRequest {
    illustrationType: IllustrationType;
    variantShape: number;
    topic: string;
    context: NarrativeContext;
    targetPoints?: string[];
    tone: string;
    audience: string;
    validate: boolean;
}

/**
 * The model's answer: one string per required field.
 */
export type GeneratedContent = Record<string, string>;

export type ViolationDirection = 'under' | 'over';

export interface ConstraintViolation {
    field: string;
    actual_length: number;
    min: number;
    max: number;
    direction: ViolationDirection;
    excerpt: string;
}

export interface ValidationReport {
    valid: boolean;
    violations: ConstraintViolation[];
}

export interface TokenUsage {
    prompt_tokens: number;
    completion_tokens: number;
}

export type AttemptSelectionPolicy = 'last' | 'fewest_violations';

export interface GenerationResult {
    content: GeneratedContent;
    validation: ValidationReport;
    attempts: number;
    selectedAttempt: number;
    usage: TokenUsage;
    elapsed_ms: number;
    model: string;
}

/**
 * Structured answer from the LLM collaborator. Values are not yet coerced.
 */
export interface LlmResponse {
    fields: Record<string, unknown>;
    usage: TokenUsage;
    model: string;
}

export type LlmCall = (prompt: string, fieldSchema: readonly string[], timeoutMs: number) => Promise<LlmResponse>;

/**
 * Flat mapping of theme_* placeholder names to colour values.
 */
export type ThemeColors = Record<string, string>;
