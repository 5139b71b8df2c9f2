import express from 'express';
import cors from 'cors';
import { createIllustrationRouter } from './routes/illustrations';
import { errorHandler, notFoundHandler, toErrorResponse } from './middleware/errorHandler';
import type { IllustrationService } from './services/illustrationService';

export function createApp(service: IllustrationService): express.Express {
    const app = express();

    // Middleware
    app.use(cors({ origin: true }));
    app.use(express.json({ limit: '1mb' }));

    app.get('/health', (_req, res) => {
        res.json({ status: 'healthy', service: 'illustrator' });
    });

    // Routes
    app.use(createIllustrationRouter(service));

    app.use(notFoundHandler);
    app.use(errorHandler);

    return app;
}

/**
 * Builds the app on the first request. A failed build is answered as a JSON error
 * and retried on the next request.
 */
export function createLazyHandler(build: () => express.Express): (req: express.Request, res: express.Response) => void {
    let app: express.Express | null = null;

    return (req, res) => {
        if (!app) {
            try {
                app = build();
            } catch (error: unknown) {
                const { status, body } = toErrorResponse(error);
                console.error(`[SERVER] Could not build the app: ${body.message}`);
                res.status(status).json(body);
                return;
            }
        }
        app(req, res);
    };
}
