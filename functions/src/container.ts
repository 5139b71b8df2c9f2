import type { LlmCall } from '@shared/types';
import type { RuntimeConfig } from './config';
import { ConstraintSpecStore } from './services/constraintSpecStore';
import { ContentGenerator } from './services/contentGenerator';
import { IllustrationService } from './services/illustrationService';
import { createGeminiLlmCall } from './services/llmClient';
import { TemplateFiller, TemplateStore } from './services/templateFiller';
import { ThemeRegistry } from './services/themeRegistry';
import { getAiClient } from './utils/geminiClient';

/**
 * Composition root. The caches live inside the stores created here, one set per container.
 */
export function createIllustrationService(config: RuntimeConfig, llm?: LlmCall): IllustrationService {
    const llmCall = llm ?? createGeminiLlmCall({
        getModels: () => getAiClient().models,
        model: config.model
    });

    return new IllustrationService({
        constraints: new ConstraintSpecStore(config.dataDir),
        templates: new TemplateFiller(new TemplateStore(config.dataDir)),
        themes: new ThemeRegistry(config.dataDir),
        generator: new ContentGenerator(llmCall, {
            maxAttempts: config.maxAttempts,
            timeoutMs: config.timeoutMs,
            selectionPolicy: config.selectionPolicy
        })
    });
}
