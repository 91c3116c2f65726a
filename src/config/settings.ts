/**
 * @file Runtime Settings Service
 *
 * Process-scoped runtime settings with central validation and
 * deterministic precedence (env > defaults). Numeric settings are
 * clamped to their bounds.
 *
 * @module
 */

import os from 'os';
import path from 'path';
import { DEFAULT_LLM_MODEL } from '../galaxy/parser/schemas.js';

export interface ResolvedSettings {
    appsDir: string;
    dataRoot: string;
    shellTimeoutMs: number;
    llmTimeoutMs: number;
    model: string;
    apiKey: string | undefined;
    baseUrl: string | undefined;
}

export type NumericSettingsKey = 'shellTimeoutMs' | 'llmTimeoutMs';

interface NumericBounds {
    min: number;
    max: number;
}

/** Environment variable backing each setting. */
export const SETTINGS_ENV: Readonly<Record<keyof ResolvedSettings, string>> = {
    appsDir: 'GALAXY_APPS_DIR',
    dataRoot: 'GALAXY_DATA_DIR',
    shellTimeoutMs: 'GALAXY_SHELL_TIMEOUT_MS',
    llmTimeoutMs: 'GALAXY_LLM_TIMEOUT_MS',
    model: 'MODEL',
    apiKey: 'OPENAI_API_KEY',
    baseUrl: 'OPENAI_BASE_URL',
};

export class SettingsService {
    private readonly numericDefaults: Record<NumericSettingsKey, number> = {
        shellTimeoutMs: 30_000,
        llmTimeoutMs: 60_000,
    };
    private readonly bounds: Record<NumericSettingsKey, NumericBounds> = {
        shellTimeoutMs: { min: 100, max: 600_000 },
        llmTimeoutMs: { min: 1_000, max: 600_000 },
    };

    constructor(
        private readonly env: NodeJS.ProcessEnv = process.env,
        private readonly cwd: string = process.cwd(),
        private readonly homeDir: string = os.homedir(),
    ) {}

    /**
     * Return effective settings.
     */
    public snapshot(): ResolvedSettings {
        return {
            appsDir: this.appsDir_resolve(),
            dataRoot: this.dataRoot_resolve(),
            shellTimeoutMs: this.numeric_resolve('shellTimeoutMs'),
            llmTimeoutMs: this.numeric_resolve('llmTimeoutMs'),
            model: this.envString_resolve(SETTINGS_ENV.model) ?? DEFAULT_LLM_MODEL,
            apiKey: this.envString_resolve(SETTINGS_ENV.apiKey),
            baseUrl: this.envString_resolve(SETTINGS_ENV.baseUrl),
        };
    }

    /**
     * Directory holding `<name>.yaml` definitions; relative values resolve
     * against the working directory.
     */
    public appsDir_resolve(): string {
        const configured: string | undefined = this.envString_resolve(SETTINGS_ENV.appsDir);
        return path.resolve(this.cwd, configured ?? 'apps');
    }

    /**
     * Root under which `databases/` is created.
     */
    public dataRoot_resolve(): string {
        const configured: string | undefined = this.envString_resolve(SETTINGS_ENV.dataRoot);
        if (configured) return path.resolve(this.cwd, this.home_expand(configured));
        return path.join(this.homeDir, '.galaxy');
    }

    /**
     * Resolve one numeric setting, clamped to its bounds.
     */
    public numeric_resolve(key: NumericSettingsKey): number {
        const envOverride: number | undefined = this.envNumeric_resolve(SETTINGS_ENV[key]);
        if (typeof envOverride === 'number') {
            return this.value_clamp(key, envOverride);
        }
        return this.numericDefaults[key];
    }

    private envString_resolve(key: string): string | undefined {
        const envRaw: string | undefined = this.env[key]?.trim();
        return envRaw ? envRaw : undefined;
    }

    private envNumeric_resolve(key: string): number | undefined {
        const envRaw: string | undefined = this.envString_resolve(key);
        if (!envRaw) return undefined;

        const parsed: number = Number.parseInt(envRaw, 10);
        return Number.isFinite(parsed) ? parsed : undefined;
    }

    private home_expand(value: string): string {
        if (value === '~') return this.homeDir;
        return value.startsWith('~/') ? path.join(this.homeDir, value.slice(2)) : value;
    }

    private value_clamp(key: NumericSettingsKey, value: number): number {
        const bounds: NumericBounds = this.bounds[key];
        return Math.max(bounds.min, Math.min(bounds.max, value));
    }
}
