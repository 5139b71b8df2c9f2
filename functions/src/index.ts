import 'module-alias/register';
import * as functions from 'firebase-functions';
import { apiKey } from './utils/geminiClient';
import { resolveRuntimeConfig } from './config';
import { createIllustrationService } from './container';
import { createApp, createLazyHandler } from './app';

// Params are only readable at request time, so the app is built on the first request
const handler = createLazyHandler(() => createApp(createIllustrationService(resolveRuntimeConfig())));

// Export the API
export const api = functions.https.onRequest(
    {
        timeoutSeconds: 300,
        memory: '512MiB',
        secrets: [apiKey]
    },
    (req, res) => {
        handler(req, res);
    }
);
