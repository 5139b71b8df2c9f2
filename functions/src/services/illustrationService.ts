import { defaultGenerateOverview, ILLUSTRATION_FAMILIES, titleCaseFields, toVariantId, withOptionalFields } from '@shared/illustrations';
import type { IllustrationFamily } from '@shared/illustrations';
import type { GenerationBody } from '@shared/schemas';
import { applyTitleCase } from '@shared/utils/textCase';
import type { FieldConstraint, GenerationRequest, IllustrationType, NarrativeContext } from '@shared/types';
import type { ConstraintSpecStore } from './constraintSpecStore';
import type { ContentGenerator } from './contentGenerator';
import type { TemplateFiller } from './templateFiller';
import type { ThemePalettes, ThemeRegistry } from './themeRegistry';
import { buildGenerationResponse, type GenerationResponseBody } from './responseAssembler';

export interface IllustrationServiceDeps {
    constraints: ConstraintSpecStore;
    templates: TemplateFiller;
    themes: ThemeRegistry;
    generator: ContentGenerator;
}

export interface VariantDescription {
    variant_id: string;
    fields: FieldConstraint[];
    optional_fields: FieldConstraint[];
    golden_example: Record<string, string>;
}

export interface FamilySummary {
    illustration_type: IllustrationType;
    display_name: string;
    endpoint: string;
    shape_field: string;
    variants: string[];
}

function toNarrativeContext(context: GenerationBody['context']): NarrativeContext {
    return {
        presentation_title: context.presentation_title,
        slide_purpose: context.slide_purpose,
        key_message: context.key_message,
        industry: context.industry,
        previous_slides: context.previous_slides
    };
}

export function toGenerationRequest(
    type: IllustrationType,
    variantShape: number,
    body: GenerationBody
): GenerationRequest {
    return {
        illustrationType: type,
        variantShape,
        topic: body.topic,
        context: toNarrativeContext(body.context),
        targetPoints: body.target_points,
        tone: body.tone,
        audience: body.audience,
        validate: body.validate_constraints
    };
}

/**
 * One generate call end to end: spec, theme and template lookup, the generation loop, fill, assemble.
 */
export class IllustrationService {
    constructor(private readonly deps: IllustrationServiceDeps) {}

    async generate(family: IllustrationFamily, variantShape: number, body: GenerationBody): Promise<GenerationResponseBody> {
        const startedAt = Date.now();
        const variantId = toVariantId(family.type, variantShape);
        const correlationId = `${variantId}-${startedAt}`;

        // Lookups that can fail the request run before any LLM call
        const baseSpec = await this.deps.constraints.load(variantId);
        const theme = await this.deps.themes.resolve(body.theme);
        const template = await this.deps.templates.prepare(family.type, variantShape);

        const includeOverview = body.generate_overview ?? defaultGenerateOverview(family.type, variantShape);
        const spec = includeOverview ? withOptionalFields(baseSpec) : baseSpec;

        console.log(`[ILLUSTRATOR:${correlationId}] Generating ${variantId} (theme=${theme.name}, overview=${includeOverview}) for "${body.topic}"`);

        const request = toGenerationRequest(family.type, variantShape, body);
        const generated = await this.deps.generator.generate(request, spec, correlationId);
        const result = { ...generated, content: applyTitleCase(generated.content, titleCaseFields(family.type, variantShape)) };
        const filled = await this.deps.templates.fill(family.type, variantShape, result.content, theme.colors);

        console.log(`[ILLUSTRATOR:${correlationId}] Done in ${Date.now() - startedAt}ms after ${result.attempts} attempt(s), valid=${result.validation.valid}`);

        return buildGenerationResponse({
            family,
            variantShape,
            topic: body.topic,
            spec,
            result,
            html: filled.html,
            templateFile: template.file,
            themeName: theme.name,
            session: body,
            startedAt
        });
    }

    async listFamilies(): Promise<FamilySummary[]> {
        return Promise.all(Object.values(ILLUSTRATION_FAMILIES).map(async family => ({
            illustration_type: family.type,
            display_name: family.displayName,
            endpoint: `/v1.0/${family.routeSlug}/generate`,
            shape_field: family.shapeField,
            variants: await this.deps.constraints.listVariants(family.type)
        })));
    }

    async describeFamily(type: IllustrationType): Promise<VariantDescription[]> {
        const variantIds = await this.deps.constraints.listVariants(type);
        return Promise.all(variantIds.map(async variantId => {
            const spec = await this.deps.constraints.load(variantId);
            return {
                variant_id: spec.variantId,
                fields: [...spec.fields],
                optional_fields: [...spec.optionalFields],
                golden_example: { ...spec.goldenExample }
            };
        }));
    }

    async listThemes(): Promise<ThemePalettes> {
        return this.deps.themes.list();
    }
}
