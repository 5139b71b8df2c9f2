import { Router } from 'express';
import { ILLUSTRATION_FAMILIES, isIllustrationType } from '@shared/illustrations';
import { NotFoundError } from '@shared/errors';
import { asyncHandler } from '../middleware/errorHandler';
import { parseGenerationBody } from '../middleware/validateRequest';
import type { IllustrationService } from '../services/illustrationService';

export function createIllustrationRouter(service: IllustrationService): Router {
    const router = Router();

    Object.values(ILLUSTRATION_FAMILIES).forEach(family => {
        router.post(`/v1.0/${family.routeSlug}/generate`, asyncHandler(async (req, res) => {
            const { variantShape, body } = parseGenerationBody(family, req.body);
            res.json(await service.generate(family, variantShape, body));
        }));
    });

    router.get('/v1.0/illustrations', asyncHandler(async (_req, res) => {
        res.json({ success: true, illustrations: await service.listFamilies() });
    }));

    router.get('/v1.0/illustration/:type', asyncHandler(async (req, res) => {
        const type = req.params.type.replace(/-/g, '_');
        if (!isIllustrationType(type)) {
            throw new NotFoundError('constraint_spec', req.params.type);
        }
        const family = ILLUSTRATION_FAMILIES[type];
        res.json({
            success: true,
            illustration_type: type,
            shape_field: family.shapeField,
            variants: await service.describeFamily(type)
        });
    }));

    router.get('/v1.0/themes', asyncHandler(async (_req, res) => {
        res.json({ success: true, themes: await service.listThemes() });
    }));

    return router;
}
