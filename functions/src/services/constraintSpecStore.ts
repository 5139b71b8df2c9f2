import { promises as fs } from 'fs';
import * as path from 'path';
import { z, ZodError } from 'zod';
import { constraintFileSchema, formatZodIssues } from '@shared/schemas';
import { isIllustrationType } from '@shared/illustrations';
import { ConfigurationError, NotFoundError } from '@shared/errors';
import { getErrorMessage } from '@shared/utils/errorMessage';
import type { ConstraintSpec, FieldConstraint, IllustrationType } from '@shared/types';
import { ReadThroughCache } from '../utils/readThroughCache';

export type ConstraintFamily = ReadonlyMap<string, ConstraintSpec>;

function toFieldList(ranges: Record<string, [number, number]> | undefined): FieldConstraint[] {
    return Object.entries(ranges ?? {}).map(([name, [min, max]]) => ({ name, min, max }));
}

/**
 * Reads and validates `constraints/<family>.json`. A missing file means the family has no specs.
 */
export async function readConstraintFamily(dataDir: string, family: IllustrationType): Promise<ConstraintFamily> {
    const filePath = path.join(dataDir, 'constraints', `${family}.json`);

    let raw: string;
    try {
        raw = await fs.readFile(filePath, 'utf-8');
    } catch (error: unknown) {
        console.warn(`[CONSTRAINTS] Could not read ${filePath}: ${getErrorMessage(error)}`);
        return new Map();
    }

    let parsed: z.infer<typeof constraintFileSchema>;
    try {
        parsed = constraintFileSchema.parse(JSON.parse(raw));
    } catch (error: unknown) {
        const issues = error instanceof ZodError
            ? formatZodIssues(error)
            : [getErrorMessage(error)];
        throw new ConfigurationError(`Invalid constraint file ${filePath}`, { issues });
    }

    const specs = new Map<string, ConstraintSpec>();
    for (const [variantId, entry] of Object.entries(parsed)) {
        specs.set(variantId, {
            variantId,
            fields: toFieldList(entry.fields),
            optionalFields: toFieldList(entry.optional_fields),
            goldenExample: entry.golden_example
        });
    }

    console.log(`[CONSTRAINTS] Loaded ${specs.size} ${family} variants from ${filePath}`);
    return specs;
}

/**
 * Looks up per-variant constraints ("pyramid_4"). One file per family, read once.
 */
export class ConstraintSpecStore {
    constructor(
        dataDir: string,
        private readonly cache = new ReadThroughCache<IllustrationType, ConstraintFamily>(
            family => readConstraintFamily(dataDir, family)
        )
    ) {}

    async load(variantId: string): Promise<ConstraintSpec> {
        const type = /^([a-z_]+)_\d+$/.exec(variantId)?.[1];
        if (!type || !isIllustrationType(type)) {
            throw new NotFoundError('constraint_spec', variantId);
        }

        const family = await this.cache.get(type);
        const spec = family.get(variantId);
        if (!spec) {
            throw new NotFoundError('constraint_spec', variantId);
        }
        return spec;
    }

    async listVariants(type: IllustrationType): Promise<string[]> {
        const family = await this.cache.get(type);
        return [...family.keys()].sort((a, b) => variantNumber(a) - variantNumber(b));
    }
}

function variantNumber(variantId: string): number {
    return Number(variantId.substring(variantId.lastIndexOf('_') + 1));
}
