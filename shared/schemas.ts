import { z, type ZodError } from 'zod';
import { DEFAULT_AUDIENCE, DEFAULT_THEME, DEFAULT_TONE } from './constants';
import type { IllustrationFamily } from './illustrations';
import type { PreviousSlide } from './types';

export const previousSlideSchema = z
    .object({
        slide_number: z.number().int(),
        slide_title: z.string().optional(),
        title: z.string().optional(), // Older callers send `title`
        summary: z.string().optional()
    })
    .transform((slide): PreviousSlide => ({
        slide_number: slide.slide_number,
        slide_title: slide.slide_title ?? slide.title ?? 'Untitled',
        summary: slide.summary
    }));

export const narrativeContextSchema = z
    .object({
        presentation_title: z.string().optional(),
        slide_purpose: z.string().optional(),
        key_message: z.string().optional(),
        industry: z.string().optional(),
        previous_slides: z.array(previousSlideSchema).default([])
    })
    .passthrough();

export const themeInputSchema = z.union([z.string().min(1), z.record(z.string())]);

export type ThemeInput = z.infer<typeof themeInputSchema>;

/**
 * Body shared by every /v1.0/<family>/generate route. The variant count lives under a
 * family-specific key and is checked by `variantShapeSchema`.
 */
export const generationBodySchema = z.object({
    topic: z.string().trim().min(3),
    context: narrativeContextSchema.default({}),
    target_points: z.array(z.string()).optional(),
    tone: z.string().min(1).default(DEFAULT_TONE),
    audience: z.string().min(1).default(DEFAULT_AUDIENCE),
    theme: themeInputSchema.default(DEFAULT_THEME),
    validate_constraints: z.boolean().default(true),
    generate_overview: z.boolean().optional(),
    presentation_id: z.string().nullish(),
    slide_id: z.string().nullish(),
    slide_number: z.number().int().nullish()
});

export type GenerationBody = z.infer<typeof generationBodySchema>;

export function variantShapeSchema(family: IllustrationFamily) {
    return z.number().int().min(family.minShape).max(family.maxShape);
}

const rangeSchema = z
    .tuple([z.number().int().nonnegative(), z.number().int().nonnegative()])
    .refine(([min, max]) => min <= max, { message: 'min must not exceed max' });

export const constraintVariantSchema = z.object({
    fields: z.record(rangeSchema),
    optional_fields: z.record(rangeSchema).optional(),
    golden_example: z.record(z.string())
});

export const constraintFileSchema = z.record(constraintVariantSchema);

export const themesFileSchema = z.record(z.record(z.string()));

/**
 * Flattens zod issues into "path: message" lines for error details.
 */
export function formatZodIssues(error: ZodError): string[] {
    return error.issues.map(issue => {
        const location = issue.path.join('.');
        return location ? `${location}: ${issue.message}` : issue.message;
    });
}
