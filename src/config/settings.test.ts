import { describe, it, expect } from 'vitest';
import path from 'path';
import { SettingsService } from './settings.js';

const CWD: string = path.resolve('/work/project');
const HOME: string = path.resolve('/home/tester');

describe('SettingsService', (): void => {
    it('resolves defaults when no overrides exist', (): void => {
        const service = new SettingsService({}, CWD, HOME);

        expect(service.snapshot()).toEqual({
            appsDir: path.join(CWD, 'apps'),
            dataRoot: path.join(HOME, '.galaxy'),
            shellTimeoutMs: 30000,
            llmTimeoutMs: 60000,
            model: 'gpt-4o',
            apiKey: undefined,
            baseUrl: undefined,
        });
    });

    it('applies env overrides with clamping', (): void => {
        const service = new SettingsService({
            GALAXY_SHELL_TIMEOUT_MS: '5',
            GALAXY_LLM_TIMEOUT_MS: '9000000',
            MODEL: 'gpt-4o-mini',
            OPENAI_API_KEY: 'test-secret',
        }, CWD, HOME);

        expect(service.numeric_resolve('shellTimeoutMs')).toBe(100);
        expect(service.numeric_resolve('llmTimeoutMs')).toBe(600000);
        expect(service.snapshot().model).toBe('gpt-4o-mini');
        expect(service.snapshot().apiKey).toBe('test-secret');
    });

    it('ignores blank and non-numeric values', (): void => {
        const service = new SettingsService({ GALAXY_SHELL_TIMEOUT_MS: 'soon', MODEL: '   ' }, CWD, HOME);

        expect(service.numeric_resolve('shellTimeoutMs')).toBe(30000);
        expect(service.snapshot().model).toBe('gpt-4o');
    });

    it('resolves directories against the working directory and home', (): void => {
        const service = new SettingsService({
            GALAXY_APPS_DIR: 'definitions',
            GALAXY_DATA_DIR: '~/galaxy-data',
        }, CWD, HOME);

        expect(service.appsDir_resolve()).toBe(path.join(CWD, 'definitions'));
        expect(service.dataRoot_resolve()).toBe(path.join(HOME, 'galaxy-data'));
    });
});
