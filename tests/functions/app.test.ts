import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { promises as fs } from 'fs';
import type { Server } from 'http';
import * as os from 'os';
import * as path from 'path';
import express from 'express';
import { createApp, createLazyHandler } from '../../functions/src/app';
import { createIllustrationService } from '../../functions/src/container';
import type { RuntimeConfig } from '../../functions/src/config';
import type { ErrorBody } from '../../functions/src/middleware/errorHandler';
import type { GenerationResponseBody } from '../../functions/src/services/responseAssembler';
import type { FamilySummary, VariantDescription } from '../../functions/src/services/illustrationService';
import { ConfigurationError, GeminiError } from '../../shared/errors';
import { constraintFileSchema } from '../../shared/schemas';
import type { LlmCall } from '../../shared/types';
import { DATA_DIR } from '../support/fixtures';

interface RunningApp {
    baseUrl: string;
    close: () => Promise<void>;
}

async function startApp(dataDir: string, llm: LlmCall): Promise<RunningApp> {
    const config: RuntimeConfig = {
        model: 'fake-model',
        timeoutMs: 1000,
        maxAttempts: 3,
        selectionPolicy: 'last',
        dataDir
    };
    const server: Server = createApp(createIllustrationService(config, llm)).listen(0, '127.0.0.1');
    await new Promise<void>(resolve => server.once('listening', () => resolve()));

    const address = server.address();
    const port = typeof address === 'object' && address !== null ? address.port : 0;
    return {
        baseUrl: `http://127.0.0.1:${port}`,
        close: () => new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())))
    };
}

async function readGolden(family: string, variantId: string): Promise<Record<string, string>> {
    const raw = await fs.readFile(path.join(DATA_DIR, 'constraints', `${family}.json`), 'utf-8');
    return constraintFileSchema.parse(JSON.parse(raw))[variantId].golden_example;
}

async function readJson<T>(res: Response): Promise<T> {
    return JSON.parse(await res.text());
}

function postJson(baseUrl: string, route: string, body: unknown): Promise<Response> {
    return fetch(`${baseUrl}${route}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body)
    });
}

describe('illustrator HTTP app', () => {
    // Each test sets what the fake model answers
    let respond: LlmCall = async () => {
        throw new Error('no reply configured');
    };
    let app: RunningApp;

    const answerWith = (fields: Record<string, string>) => {
        respond = async () => ({ fields, usage: { prompt_tokens: 10, completion_tokens: 5 }, model: 'fake-model' });
    };

    beforeAll(async () => {
        app = await startApp(DATA_DIR, (prompt, schema, timeoutMs) => respond(prompt, schema, timeoutMs));
    });

    afterAll(async () => {
        await app.close();
    });

    it('reports health', async () => {
        const res = await fetch(`${app.baseUrl}/health`);
        expect(res.status).toBe(200);
        expect(await res.json()).toEqual({ status: 'healthy', service: 'illustrator' });
    });

    it('generates a pyramid fragment with metadata and echoed session fields', async () => {
        answerWith(await readGolden('pyramid', 'pyramid_3'));

        const res = await postJson(app.baseUrl, '/v1.0/pyramid/generate', {
            num_levels: 3,
            topic: 'Product strategy',
            presentation_id: 'deck-1',
            slide_number: 4
        });
        const body = await readJson<GenerationResponseBody>(res);

        expect(res.status).toBe(200);
        expect(body.success).toBe(true);
        expect(body.infographic_html).toBe(body.html);
        expect(body.html).toContain('User Research');
        expect(body.html).toContain('From Insight to Leadership');
        expect(body.html).not.toMatch(/\{[A-Za-z0-9_]+\}/);
        expect(body.metadata).toMatchObject({
            illustration_type: 'pyramid',
            variant_id: 'pyramid_3',
            num_levels: 3,
            template_file: 'pyramid/3.html',
            theme: 'professional',
            topic: 'Product strategy',
            attempts: 1,
            selected_attempt: 1,
            model: 'fake-model',
            usage: { prompt_tokens: 10, completion_tokens: 5 }
        });
        expect(body.character_counts.level_1_label).toBe(13);
        expect(body.character_counts.overview_heading).toBe(26);
        expect(body.validation).toEqual({ valid: true, violations: [] });
        expect(body.presentation_id).toBe('deck-1');
        expect(body.slide_id).toBeNull();
        expect(body.slide_number).toBe(4);
    });

    it('serves the round table under its hyphenated route', async () => {
        answerWith(await readGolden('round_table', 'round_table_4'));

        const res = await postJson(app.baseUrl, '/v1.0/round-table/generate', { num_elements: 4, topic: 'Cross-team planning' });
        const body = await readJson<GenerationResponseBody>(res);

        expect(res.status).toBe(200);
        expect(body.metadata).toMatchObject({ illustration_type: 'round_table', variant_id: 'round_table_4', num_elements: 4 });
        expect(body.html).toContain('Strategy Council');
    });

    it('returns 200 with the violations when retries run out', async () => {
        answerWith({ ...(await readGolden('funnel', 'funnel_3')), stage_1_name: 'Top' });

        const res = await postJson(app.baseUrl, '/v1.0/funnel/generate', { num_stages: 3, topic: 'Sales pipeline' });
        const body = await readJson<GenerationResponseBody>(res);

        expect(res.status).toBe(200);
        expect(body.metadata.attempts).toBe(3);
        expect(body.validation.valid).toBe(false);
        expect(body.validation.violations).toEqual([
            { field: 'stage_1_name', actual_length: 3, min: 8, max: 25, direction: 'under', excerpt: 'Top' }
        ]);
    });

    it('title-cases funnel stage names before filling the template', async () => {
        answerWith({ ...(await readGolden('funnel', 'funnel_3')), stage_1_name: 'PRODUCT DEVELOPMENT' });

        const res = await postJson(app.baseUrl, '/v1.0/funnel/generate', { num_stages: 3, topic: 'Sales pipeline' });
        const body = await readJson<GenerationResponseBody>(res);

        expect(res.status).toBe(200);
        expect(body.generated_content.stage_1_name).toBe('Product Development');
        expect(body.html).toContain('>Product Development</div>');
        expect(body.html).not.toContain('PRODUCT DEVELOPMENT');
    });

    it('rejects a shape outside the family bounds', async () => {
        const res = await postJson(app.baseUrl, '/v1.0/pyramid/generate', { num_levels: 9, topic: 'Product strategy' });

        expect(res.status).toBe(400);
        expect(await readJson<ErrorBody>(res)).toEqual({
            success: false,
            code: 'INVALID_REQUEST',
            message: 'Invalid pyramid request',
            details: { issues: ['num_levels: Number must be less than or equal to 6'] }
        });
    });

    it('rejects a missing topic', async () => {
        const res = await postJson(app.baseUrl, '/v1.0/concentric_circles/generate', { num_circles: 4 });
        const body = await readJson<ErrorBody>(res);

        expect(res.status).toBe(400);
        expect(body.details).toEqual({ issues: ['topic: Required'] });
    });

    it('rejects malformed JSON', async () => {
        const res = await fetch(`${app.baseUrl}/v1.0/funnel/generate`, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body: '{"num_stages": 3,'
        });

        expect(res.status).toBe(400);
        expect(await res.json()).toEqual({ success: false, code: 'INVALID_REQUEST', message: 'Request body is not valid JSON' });
    });

    it('rejects an unknown theme', async () => {
        const res = await postJson(app.baseUrl, '/v1.0/funnel/generate', { num_stages: 3, topic: 'Sales pipeline', theme: 'neon' });
        const body = await readJson<ErrorBody>(res);

        expect(res.status).toBe(400);
        expect(body.message).toBe("Unknown theme 'neon'");
    });

    it('returns 500 when the model fails on every attempt', async () => {
        respond = async () => {
            throw new GeminiError('Request timed out after 1000ms', 'TIMEOUT', true);
        };

        const res = await postJson(app.baseUrl, '/v1.0/funnel/generate', { num_stages: 4, topic: 'Sales pipeline' });
        const body = await readJson<ErrorBody>(res);

        expect(res.status).toBe(500);
        expect(body).toEqual({
            success: false,
            code: 'GENERATION_FAILED',
            message: 'Content generation failed after 3 attempts: Request timed out after 1000ms',
            details: { attempts: 3, llmErrorCode: 'TIMEOUT' }
        });
    });

    it('returns 503 when the model is not configured', async () => {
        respond = async () => {
            throw new ConfigurationError('GEMINI_API_KEY secret not configured or available');
        };

        const res = await postJson(app.baseUrl, '/v1.0/pyramid/generate', { num_levels: 5, topic: 'Product strategy' });

        expect(res.status).toBe(503);
        expect(await res.json()).toEqual({
            success: false,
            code: 'CONFIGURATION_ERROR',
            message: 'GEMINI_API_KEY secret not configured or available'
        });
    });

    it('lists the illustration families', async () => {
        const res = await fetch(`${app.baseUrl}/v1.0/illustrations`);
        const body = await readJson<{ illustrations: FamilySummary[] }>(res);

        expect(res.status).toBe(200);
        expect(body.illustrations).toHaveLength(4);
        expect(body.illustrations[0]).toEqual({
            illustration_type: 'pyramid',
            display_name: 'Pyramid',
            endpoint: '/v1.0/pyramid/generate',
            shape_field: 'num_levels',
            variants: ['pyramid_3', 'pyramid_4', 'pyramid_5', 'pyramid_6']
        });
    });

    it('describes one family', async () => {
        const res = await fetch(`${app.baseUrl}/v1.0/illustration/round-table`);
        const body = await readJson<{ illustration_type: string; variants: VariantDescription[] }>(res);

        expect(res.status).toBe(200);
        expect(body.illustration_type).toBe('round_table');
        expect(body.variants).toHaveLength(4);
        expect(body.variants[0].fields[0]).toEqual({ name: 'center_label', min: 5, max: 20 });
    });

    it('returns 404 for an unknown family', async () => {
        const res = await fetch(`${app.baseUrl}/v1.0/illustration/hexagon`);
        expect(res.status).toBe(404);
        expect((await readJson<ErrorBody>(res)).code).toBe('NOT_FOUND');
    });

    it('lists the themes', async () => {
        const res = await fetch(`${app.baseUrl}/v1.0/themes`);
        const body = await readJson<{ themes: Record<string, Record<string, string>> }>(res);

        expect(res.status).toBe(200);
        expect(body.themes.professional.primary).toBe('#0066CC');
    });

    it('returns 404 for an unknown route', async () => {
        const res = await fetch(`${app.baseUrl}/v1.0/hexagon/generate`, { method: 'POST' });
        expect(res.status).toBe(404);
        expect(await res.json()).toEqual({ success: false, code: 'NOT_FOUND', message: 'No route for POST /v1.0/hexagon/generate' });
    });
});

describe('illustrator HTTP app with incomplete data', () => {
    let dir: string;
    let app: RunningApp;
    let llmCalls = 0;

    beforeAll(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'illustrator-app-'));
        await fs.mkdir(path.join(dir, 'constraints'), { recursive: true });
        await fs.copyFile(path.join(DATA_DIR, 'constraints', 'pyramid.json'), path.join(dir, 'constraints', 'pyramid.json'));
        await fs.copyFile(path.join(DATA_DIR, 'themes.json'), path.join(dir, 'themes.json'));

        app = await startApp(dir, async () => {
            llmCalls++;
            return { fields: {}, usage: { prompt_tokens: 0, completion_tokens: 0 }, model: 'fake-model' };
        });
    });

    afterAll(async () => {
        await app.close();
        await fs.rm(dir, { recursive: true, force: true });
    });

    it('returns 404 for a variant without a constraint spec', async () => {
        const res = await postJson(app.baseUrl, '/v1.0/funnel/generate', { num_stages: 3, topic: 'Sales pipeline' });

        expect(res.status).toBe(404);
        expect(await res.json()).toEqual({
            success: false,
            code: 'NOT_FOUND',
            message: "No constraint spec found for 'funnel_3'",
            details: { kind: 'constraint_spec', key: 'funnel_3' }
        });
    });

    it('returns 404 for a missing template before calling the model', async () => {
        const res = await postJson(app.baseUrl, '/v1.0/pyramid/generate', { num_levels: 4, topic: 'Product strategy' });

        expect(res.status).toBe(404);
        expect((await readJson<ErrorBody>(res)).details).toEqual({ kind: 'template', key: 'pyramid_4' });
        expect(llmCalls).toBe(0);
    });
});

describe('createLazyHandler', () => {
    it('answers a failed build with a JSON error and builds again on the next request', async () => {
        let builds = 0;
        const handler = createLazyHandler(() => {
            builds += 1;
            if (builds === 1) {
                throw new ConfigurationError("ATTEMPT_SELECTION must be 'last' or 'fewest_violations', got 'best'");
            }
            const inner = express();
            inner.get('/health', (_req, res) => {
                res.json({ status: 'healthy' });
            });
            return inner;
        });

        const outer = express();
        outer.use((req, res) => handler(req, res));
        const server: Server = outer.listen(0, '127.0.0.1');
        await new Promise<void>(resolve => server.once('listening', () => resolve()));
        const address = server.address();
        const port = typeof address === 'object' && address !== null ? address.port : 0;

        try {
            const failed = await fetch(`http://127.0.0.1:${port}/health`);
            expect(failed.status).toBe(503);
            expect(await readJson<ErrorBody>(failed)).toEqual({
                success: false,
                code: 'CONFIGURATION_ERROR',
                message: "ATTEMPT_SELECTION must be 'last' or 'fewest_violations', got 'best'"
            });

            const recovered = await fetch(`http://127.0.0.1:${port}/health`);
            expect(recovered.status).toBe(200);
            expect(await recovered.json()).toEqual({ status: 'healthy' });
            expect(builds).toBe(2);
        } finally {
            await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
        }
    });
});
