import * as path from 'path';
import type { ConstraintSpec, GenerationRequest } from '../../shared/types';

export const DATA_DIR = path.resolve(__dirname, '../../functions/data');

export const PYRAMID_3_SPEC: ConstraintSpec = {
    variantId: 'pyramid_3',
    fields: [
        { name: 'level_1_label', min: 5, max: 20 },
        { name: 'level_1_desc', min: 50, max: 100 },
        { name: 'level_2_label', min: 5, max: 20 },
        { name: 'level_2_desc', min: 50, max: 100 },
        { name: 'level_3_label', min: 5, max: 20 },
        { name: 'level_3_desc', min: 50, max: 100 }
    ],
    optionalFields: [],
    goldenExample: {}
};

export const VALID_PYRAMID_3: Record<string, string> = {
    level_1_label: 'User Research',
    level_1_desc: 'Interview <strong>real customers</strong> to map the needs we must solve first',
    level_2_label: 'Product Design',
    level_2_desc: 'Turn research into <strong>testable prototypes</strong> and a clear product brief',
    level_3_label: 'Leadership',
    level_3_desc: 'Set the <strong>category standard</strong> that competitors measure against'
};

export function makeRequest(overrides: Partial<GenerationRequest> = {}): GenerationRequest {
    return {
        illustrationType: 'pyramid',
        variantShape: 3,
        topic: 'Building a product organisation',
        context: { previous_slides: [] },
        tone: 'professional',
        audience: 'executives',
        validate: true,
        ...overrides
    };
}
