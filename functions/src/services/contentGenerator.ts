import { buildIllustrationPrompt } from '@shared/promptBuilders';
import { formatValidationReport, validateContent } from '@shared/utils/validation';
import { ConfigurationError, GenerationFailedError } from '@shared/errors';
import { toGeminiError } from '@shared/utils/retryLogic';
import { DEFAULT_LLM_TIMEOUT_MS, DEFAULT_MAX_ATTEMPTS } from '@shared/constants';
import type {
    AttemptSelectionPolicy,
    ConstraintSpec,
    GeneratedContent,
    GenerationRequest,
    GenerationResult,
    LlmCall,
    TokenUsage,
    ValidationReport
} from '@shared/types';
import { GenerationRun } from './generationStateMachine';

export interface ContentGeneratorOptions {
    maxAttempts: number;
    timeoutMs: number;
    selectionPolicy: AttemptSelectionPolicy;
}

export const DEFAULT_GENERATOR_OPTIONS: ContentGeneratorOptions = {
    maxAttempts: DEFAULT_MAX_ATTEMPTS,
    timeoutMs: DEFAULT_LLM_TIMEOUT_MS,
    selectionPolicy: 'last'
};

interface AttemptRecord {
    attempt: number;
    content: GeneratedContent;
    validation: ValidationReport;
}

const PASSING_REPORT: ValidationReport = { valid: true, violations: [] };

/**
 * Every schema field becomes a string. Missing and null values become "", other scalars are stringified.
 */
export function coerceContent(fields: Record<string, unknown>, fieldSchema: readonly string[]): GeneratedContent {
    const content: GeneratedContent = {};
    for (const name of fieldSchema) {
        const value = fields[name];
        if (typeof value === 'string') {
            content[name] = value;
        } else if (typeof value === 'number' || typeof value === 'boolean') {
            content[name] = String(value);
        } else {
            content[name] = '';
        }
    }
    return content;
}

export function selectAttempt(records: readonly AttemptRecord[], policy: AttemptSelectionPolicy): AttemptRecord {
    const last = records[records.length - 1];
    if (policy === 'last') return last;

    // Later attempts win ties
    return records.reduce((best, record) =>
        record.validation.violations.length <= best.validation.violations.length ? record : best
    );
}

/**
 * Drives prompt -> LLM -> validate until the content fits or the attempts run out.
 * Constraint violations never fail a request; only LLM failure on the final attempt does.
 */
export class ContentGenerator {
    private readonly options: ContentGeneratorOptions;

    constructor(private readonly llm: LlmCall, options: Partial<ContentGeneratorOptions> = {}) {
        this.options = { ...DEFAULT_GENERATOR_OPTIONS, ...options };
        if (!Number.isInteger(this.options.maxAttempts) || this.options.maxAttempts < 1) {
            throw new ConfigurationError(`maxAttempts must be a positive integer, got ${this.options.maxAttempts}`);
        }
    }

    async generate(
        request: GenerationRequest,
        spec: ConstraintSpec,
        correlationId = `${spec.variantId}-${Date.now()}`
    ): Promise<GenerationResult> {
        const { maxAttempts, timeoutMs, selectionPolicy } = this.options;
        const tag = `[ILLUSTRATOR:${correlationId}]`;
        const run = new GenerationRun(tag);
        const startedAt = Date.now();
        const usage: TokenUsage = { prompt_tokens: 0, completion_tokens: 0 };
        const records: AttemptRecord[] = [];
        let model = '';
        let previousReport: ValidationReport | undefined;

        for (let attempt = 1; attempt <= maxAttempts; attempt++) {
            run.transition('generating');
            const { promptText, fieldSchema } = buildIllustrationPrompt(request, spec, attempt, previousReport);
            console.log(`${tag} Attempt ${attempt}/${maxAttempts} for ${spec.variantId} (${fieldSchema.length} fields)`);

            let fields: Record<string, unknown>;
            try {
                const response = await this.llm(promptText, fieldSchema, timeoutMs);
                fields = response.fields;
                model = response.model;
                usage.prompt_tokens += response.usage.prompt_tokens;
                usage.completion_tokens += response.usage.completion_tokens;
            } catch (error: unknown) {
                if (error instanceof ConfigurationError) throw error;

                const llmError = toGeminiError(error);
                if (attempt === maxAttempts) {
                    run.transition('failed');
                    console.error(`${tag} LLM call failed on final attempt ${attempt}: ${llmError.code} ${llmError.message}`);
                    throw new GenerationFailedError(attempt, llmError);
                }

                console.warn(`${tag} LLM call failed on attempt ${attempt} (${llmError.code}, retryable=${llmError.isRetryable}). Retrying.`);
                run.transition('retrying');
                continue;
            }

            const content = coerceContent(fields, fieldSchema);

            if (!request.validate) {
                run.transition('done');
                records.push({ attempt, content, validation: PASSING_REPORT });
                break;
            }

            run.transition('validating');
            const validation = validateContent(content, spec);
            records.push({ attempt, content, validation });

            if (validation.valid) {
                run.transition('done');
                console.log(`${tag} Content valid on attempt ${attempt}`);
                break;
            }

            console.warn(`${tag} ${formatValidationReport(validation)}`);

            if (attempt === maxAttempts) {
                run.transition('degraded');
                console.warn(`${tag} Retries exhausted; returning best-effort content`);
                break;
            }

            previousReport = validation;
            run.transition('retrying');
        }

        // The last attempt either produced a record or threw
        const selected = selectAttempt(records, selectionPolicy);
        const attempts = records.length > 0 ? records[records.length - 1].attempt : maxAttempts;

        return {
            content: selected.content,
            validation: selected.validation,
            attempts,
            selectedAttempt: selected.attempt,
            usage,
            elapsed_ms: Date.now() - startedAt,
            model
        };
    }
}
