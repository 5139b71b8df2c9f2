import { promises as fs } from 'fs';
import * as path from 'path';
import { themesFileSchema, type ThemeInput } from '@shared/schemas';
import { DEFAULT_THEME, THEME_PLACEHOLDER_PREFIX } from '@shared/constants';
import { ConfigurationError, RequestValidationError } from '@shared/errors';
import { getErrorMessage } from '@shared/utils/errorMessage';
import type { ThemeColors } from '@shared/types';
import { ReadThroughCache } from '../utils/readThroughCache';

export type ThemePalettes = Readonly<Record<string, Readonly<Record<string, string>>>>;

export async function readThemePalettes(dataDir: string): Promise<ThemePalettes> {
    const filePath = path.join(dataDir, 'themes.json');
    try {
        const palettes = themesFileSchema.parse(JSON.parse(await fs.readFile(filePath, 'utf-8')));
        if (!palettes[DEFAULT_THEME]) {
            throw new Error(`missing default palette '${DEFAULT_THEME}'`);
        }
        return palettes;
    } catch (error: unknown) {
        throw new ConfigurationError(`Invalid theme file ${filePath}: ${getErrorMessage(error)}`);
    }
}

function toPlaceholderKey(role: string): string {
    return role.startsWith(THEME_PLACEHOLDER_PREFIX) ? role : `${THEME_PLACEHOLDER_PREFIX}${role}`;
}

/**
 * Turns a theme name, or a flat object of colour overrides, into theme_* placeholder values.
 */
export class ThemeRegistry {
    constructor(
        dataDir: string,
        private readonly cache = new ReadThroughCache<'themes', ThemePalettes>(() => readThemePalettes(dataDir))
    ) {}

    async list(): Promise<ThemePalettes> {
        return this.cache.get('themes');
    }

    async resolve(input: ThemeInput): Promise<{ name: string; colors: ThemeColors }> {
        const palettes = await this.list();

        let name: string;
        let palette: Record<string, string>;
        if (typeof input === 'string') {
            if (!Object.prototype.hasOwnProperty.call(palettes, input)) {
                throw new RequestValidationError(`Unknown theme '${input}'`, [
                    `theme must be one of: ${Object.keys(palettes).join(', ')}`
                ]);
            }
            name = input;
            palette = { ...palettes[input] };
        } else {
            name = 'custom';
            palette = { ...palettes[DEFAULT_THEME], ...input };
        }

        const colors: ThemeColors = { [`${THEME_PLACEHOLDER_PREFIX}name`]: name };
        for (const [role, value] of Object.entries(palette)) {
            colors[toPlaceholderKey(role)] = value;
        }
        return { name, colors };
    }
}
