import type { ConstraintSpec, IllustrationType } from './types';

export interface IllustrationFamily {
    type: IllustrationType;
    routeSlug: string;        // Path segment under /v1.0/
    shapeField: string;       // Request field holding the variant count
    minShape: number;
    maxShape: number;
    displayName: string;
}

export const ILLUSTRATION_FAMILIES: Record<IllustrationType, IllustrationFamily> = {
    pyramid: {
        type: 'pyramid',
        routeSlug: 'pyramid',
        shapeField: 'num_levels',
        minShape: 3,
        maxShape: 6,
        displayName: 'Pyramid'
    },
    funnel: {
        type: 'funnel',
        routeSlug: 'funnel',
        shapeField: 'num_stages',
        minShape: 3,
        maxShape: 5,
        displayName: 'Funnel'
    },
    concentric_circles: {
        type: 'concentric_circles',
        routeSlug: 'concentric_circles',
        shapeField: 'num_circles',
        minShape: 3,
        maxShape: 5,
        displayName: 'Concentric Circles'
    },
    round_table: {
        type: 'round_table',
        routeSlug: 'round-table',
        shapeField: 'num_elements',
        minShape: 3,
        maxShape: 6,
        displayName: 'Round Table'
    }
};

export function isIllustrationType(value: string): value is IllustrationType {
    return Object.prototype.hasOwnProperty.call(ILLUSTRATION_FAMILIES, value);
}

export function toVariantId(type: IllustrationType, variantShape: number): string {
    return `${type}_${variantShape}`;
}

// Funnel stage names come back in capitals and are shown title-cased
export function titleCaseFields(type: IllustrationType, variantShape: number): string[] {
    if (type !== 'funnel') return [];
    return Array.from({ length: variantShape }, (_, index) => `stage_${index + 1}_name`);
}

// Pyramids with few levels leave room for the overview panel
export function defaultGenerateOverview(type: IllustrationType, variantShape: number): boolean {
    return type === 'pyramid' && (variantShape === 3 || variantShape === 4);
}

/**
 * Returns a copy of `spec` whose required fields also include its optional ones.
 */
export function withOptionalFields(spec: ConstraintSpec): ConstraintSpec {
    if (spec.optionalFields.length === 0) return spec;
    return {
        ...spec,
        fields: [...spec.fields, ...spec.optionalFields],
        optionalFields: []
    };
}
