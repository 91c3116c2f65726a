import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { env_load, envText_parse } from './env.js';

describe('envText_parse', (): void => {
    it('reads pairs, skipping comments and blank lines', (): void => {
        const text: string = [
            '# credentials',
            '',
            'OPENAI_API_KEY="test-secret"',
            "MODEL='gpt-4o-mini'",
            'export GALAXY_APPS_DIR=apps',
            'OPENAI_BASE_URL=http://llm.test/v1?a=b',
            'not a pair',
        ].join('\n');

        expect(envText_parse(text)).toEqual({
            OPENAI_API_KEY: 'test-secret',
            MODEL: 'gpt-4o-mini',
            GALAXY_APPS_DIR: 'apps',
            OPENAI_BASE_URL: 'http://llm.test/v1?a=b',
        });
    });
});

describe('env_load', (): void => {
    let dir: string;

    beforeEach((): void => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'galaxy-env-'));
    });

    afterEach((): void => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('never overwrites variables already set', (): void => {
        fs.writeFileSync(path.join(dir, '.env'), 'MODEL=from-file\nOPENAI_API_KEY=test-secret\n');
        const env: NodeJS.ProcessEnv = { MODEL: 'from-env' };

        expect(env_load(dir, env)).toEqual(['OPENAI_API_KEY']);
        expect(env).toEqual({ MODEL: 'from-env', OPENAI_API_KEY: 'test-secret' });
    });

    it('does nothing without a .env file', (): void => {
        const env: NodeJS.ProcessEnv = {};
        expect(env_load(dir, env)).toEqual([]);
        expect(env).toEqual({});
    });
});
