import 'module-alias/register';
import { resolveRuntimeConfig } from './config';
import { createIllustrationService } from './container';
import { createApp } from './app';

const port = Number(process.env.PORT) || 8080;
const config = resolveRuntimeConfig();
const app = createApp(createIllustrationService(config));

app.listen(port, () => {
    console.log(`[SERVER] Illustrator listening on :${port} (model=${config.model}, attempts=${config.maxAttempts}, selection=${config.selectionPolicy})`);
});
