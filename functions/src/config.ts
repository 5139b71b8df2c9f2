import * as path from 'path';
import { defineInt, defineString } from 'firebase-functions/params';
import { DEFAULT_LLM_TIMEOUT_MS, DEFAULT_MAX_ATTEMPTS, MODEL_ILLUSTRATION_CONTENT } from '@shared/constants';
import { ConfigurationError } from '@shared/errors';
import type { AttemptSelectionPolicy } from '@shared/types';

const geminiModel = defineString('GEMINI_MODEL', { default: MODEL_ILLUSTRATION_CONTENT });
const llmTimeoutMs = defineInt('LLM_TIMEOUT_MS', { default: DEFAULT_LLM_TIMEOUT_MS });
const maxGenerationAttempts = defineInt('MAX_GENERATION_ATTEMPTS', { default: DEFAULT_MAX_ATTEMPTS });
const attemptSelection = defineString('ATTEMPT_SELECTION', { default: 'last' });
const dataDir = defineString('ILLUSTRATOR_DATA_DIR', { default: '' });

export interface RuntimeConfig {
    model: string;
    timeoutMs: number;
    maxAttempts: number;
    selectionPolicy: AttemptSelectionPolicy;
    dataDir: string;
}

export function parseSelectionPolicy(value: string): AttemptSelectionPolicy {
    if (value === '' || value === 'last') return 'last';
    if (value === 'fewest_violations') return value;
    throw new ConfigurationError(`ATTEMPT_SELECTION must be 'last' or 'fewest_violations', got '${value}'`);
}

function positiveOr(value: number, fallback: number): number {
    return Number.isInteger(value) && value > 0 ? value : fallback;
}

/**
 * Reads the params at call time. Param defaults only apply on deploy, so unset values fall back here.
 */
export function resolveRuntimeConfig(): RuntimeConfig {
    return {
        model: geminiModel.value() || MODEL_ILLUSTRATION_CONTENT,
        timeoutMs: positiveOr(llmTimeoutMs.value(), DEFAULT_LLM_TIMEOUT_MS),
        maxAttempts: positiveOr(maxGenerationAttempts.value(), DEFAULT_MAX_ATTEMPTS),
        selectionPolicy: parseSelectionPolicy(attemptSelection.value()),
        dataDir: dataDir.value() || path.resolve(process.cwd(), 'functions', 'data')
    };
}
