import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import fc from 'fast-check';
import { GalaxyEngine, mode_select, shellError_fromCapture, targetModel_resolve } from './GalaxyEngine.js';
import { StoreManager } from '../store/StoreManager.js';
import { ConfigError, LLMError, ShellError } from '../core/errors.js';
import { result_format } from '../format/ResultFormatter.js';
import { SystemShellRunner, type ShellCapture, type ShellRunner } from './shell.js';
import type { LlmCompleter } from '../llm/types.js';
import type { ExecutionResult } from './types.js';
import type { GalaxyDescriptor, ModelSpec } from '../galaxy/types.js';
import type { GalaxyRecord, StoreHandle } from '../store/types.js';

const FOOD_ENTRY: ModelSpec = { name: 'FoodEntry', type: 'json' };

function descriptor_create(overrides: Partial<GalaxyDescriptor> = {}): GalaxyDescriptor {
    return {
        name: 'x',
        title: 'x',
        description: '',
        action: null,
        llm: null,
        database: null,
        interactive: false,
        sourcePath: null,
        ...overrides,
    };
}

function llmDescriptor_create(prompt: string, models: ModelSpec[] = [FOOD_ENTRY]): GalaxyDescriptor {
    return descriptor_create({
        llm: { provider: 'openai', model: 'gpt-4o', useLLM: true, prompt },
        database: { models, target: null },
    });
}

function capture_create(overrides: Partial<ShellCapture> = {}): ShellCapture {
    return { stdout: '', stderr: '', exitCode: 0, timedOut: false, ...overrides };
}

describe('mode_select', (): void => {
    it('prefers the llm block when useLLM is true', (): void => {
        const descriptor: GalaxyDescriptor = descriptor_create({
            action: 'echo hi',
            llm: { provider: 'openai', model: 'gpt-4o', useLLM: true, prompt: 'p' },
        });
        expect(mode_select(descriptor)).toEqual({ kind: 'llm', prompt: 'p', model: 'gpt-4o' });
    });

    it('falls back to the action when useLLM is false', (): void => {
        const descriptor: GalaxyDescriptor = descriptor_create({
            action: 'echo hi',
            llm: { provider: 'openai', model: 'gpt-4o', useLLM: false, prompt: 'p' },
        });
        expect(mode_select(descriptor)).toEqual({ kind: 'shell', command: 'echo hi' });
    });

    it('throws ConfigError when nothing is executable', (): void => {
        expect(() => mode_select(descriptor_create())).toThrow(ConfigError);
    });
});

describe('targetModel_resolve', (): void => {
    it('uses the declared target, else the first model', (): void => {
        const second: ModelSpec = { name: 'Second', type: 'json' };
        expect(targetModel_resolve(descriptor_create({ database: { models: [FOOD_ENTRY, second], target: null } })))
            .toBe(FOOD_ENTRY);
        expect(targetModel_resolve(descriptor_create({ database: { models: [FOOD_ENTRY, second], target: 'Second' } })))
            .toBe(second);
        expect(targetModel_resolve(descriptor_create())).toBeNull();
    });
});

describe('shellError_fromCapture', (): void => {
    it('describes exits, timeouts and signals', (): void => {
        expect(shellError_fromCapture(capture_create(), 1000)).toBeNull();
        expect(shellError_fromCapture(capture_create({ exitCode: 2 }), 1000)?.message).toBe('shell action exited with code 2');
        expect(shellError_fromCapture(capture_create({ exitCode: null, timedOut: true }), 1000)?.message)
            .toBe('shell action timed out after 1000 ms');
        expect(shellError_fromCapture(capture_create({ exitCode: null }), 1000)?.message)
            .toBe('shell action was killed by a signal');
    });
});

describe('GalaxyEngine', (): void => {
    let dataRoot: string;
    let stores: StoreManager;
    let shell: ShellRunner;
    let execMock: Mock<(command: string, timeoutMs: number) => ShellCapture>;
    let completeMock: Mock<(model: string, prompt: string) => Promise<string>>;
    let llm: LlmCompleter;
    let logs: string[];

    function engine_create(withLlm: boolean = true): GalaxyEngine {
        return new GalaxyEngine({
            llm: withLlm ? llm : null,
            shell,
            stores,
            options: { shellTimeoutMs: 1000 },
            telemetryHooks: { log_emit: (message: string): void => { logs.push(message); } },
        });
    }

    function records_read(galaxy: string, model: ModelSpec): GalaxyRecord[] {
        const handle: StoreHandle | null = stores.store_open(galaxy);
        if (!handle) return [];
        try {
            return stores.records_list(handle, model);
        } finally {
            stores.store_close(galaxy);
        }
    }

    beforeEach((): void => {
        dataRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'galaxy-engine-'));
        stores = new StoreManager(dataRoot);
        execMock = vi.fn<(command: string, timeoutMs: number) => ShellCapture>();
        shell = { exec: execMock };
        completeMock = vi.fn<(model: string, prompt: string) => Promise<string>>();
        llm = { complete: completeMock };
        logs = [];
    });

    afterEach((): void => {
        stores.stores_closeAll();
        fs.rmSync(dataRoot, { recursive: true, force: true });
    });

    it('runs a shell action and persists nothing without models', async (): Promise<void> => {
        execMock.mockReturnValue(capture_create({ stdout: 'hi\n' }));
        const descriptor: GalaxyDescriptor = descriptor_create({ name: 'system-info', action: 'echo hi' });

        const result: ExecutionResult = await engine_create().run(descriptor, null);

        expect(execMock).toHaveBeenCalledWith('echo hi', 1000);
        expect(result.status).toBe('succeeded');
        if (result.status === 'succeeded') {
            expect(result.persistence).toEqual({ status: 'skipped', reason: 'no model declared' });
        }
        const output = result_format(result);
        expect(output.text).toBe('hi');
        expect(output.persistedId).toBeUndefined();
        expect(stores.stores_list()).toEqual([]);
    });

    it('sends the resolved prompt and numbers persisted records per galaxy', async (): Promise<void> => {
        completeMock.mockResolvedValue('{"calories": 100}');
        const descriptor: GalaxyDescriptor = llmDescriptor_create('Echo: {{user_input}}');
        const engine: GalaxyEngine = engine_create();
        const closeSpy = vi.spyOn(stores, 'store_close');

        const first: ExecutionResult = await engine.run(descriptor, 'toast');
        const second: ExecutionResult = await engine.run(descriptor, 'toast');
        expect(closeSpy.mock.calls).toEqual([['x'], ['x']]);

        expect(completeMock).toHaveBeenCalledWith('gpt-4o', 'Echo: toast');
        expect(result_format(first).persistedId).toBe(1);
        expect(result_format(second).persistedId).toBe(2);
        expect(result_format(first).text).toBe('{"calories":100}');

        const records: GalaxyRecord[] = records_read('x', FOOD_ENTRY);
        expect(records[1].parsed).toEqual({ calories: 100 });
        expect(logs).toContain('stored record 1 in x/foodentry');
    });

    it('displays and stores JSON numbers with every digit', async (): Promise<void> => {
        completeMock.mockResolvedValue('{"barcode": 12345678901234567890}');
        const result: ExecutionResult = await engine_create().run(llmDescriptor_create('{{user_input}}'), 'scan');

        expect(result_format(result).text).toBe('{"barcode":12345678901234567890}');
        expect(records_read('x', FOOD_ENTRY)[0].content).toBe('{"barcode":12345678901234567890}');
    });

    it('stores non-JSON completions as raw text', async (): Promise<void> => {
        completeMock.mockResolvedValue('about 300 calories');
        const result: ExecutionResult = await engine_create().run(llmDescriptor_create('{{user_input}}'), 'soup');

        expect(result_format(result).text).toBe('about 300 calories');
        expect(records_read('x', FOOD_ENTRY)[0].content).toBe('about 300 calories');
    });

    it('reports a non-zero shell exit as a succeeded result with an error marker', async (): Promise<void> => {
        execMock.mockReturnValue(capture_create({ stdout: 'partial\n', stderr: 'boom\n', exitCode: 2 }));
        const descriptor: GalaxyDescriptor = descriptor_create({
            action: 'exit 2',
            database: { models: [FOOD_ENTRY], target: null },
        });

        const result: ExecutionResult = await engine_create().run(descriptor, null);

        expect(result.status).toBe('succeeded');
        if (result.status === 'succeeded') {
            expect(result.raw.mode === 'shell' ? result.raw.error : null).toBeInstanceOf(ShellError);
            expect(result.persistence).toEqual({ status: 'skipped', reason: 'shell action failed' });
        }
        expect(result_format(result)).toEqual({
            ok: true,
            text: 'partial\nboom\n[error] exit code 2',
            warnings: [],
        });
    });

    it('quotes user input substituted into shell actions', async (): Promise<void> => {
        execMock.mockReturnValue(capture_create());
        await engine_create().run(descriptor_create({ action: 'echo {{user_input}}' }), "a; rm -rf '/'");

        expect(execMock).toHaveBeenCalledWith("echo 'a; rm -rf '\\''/'\\'''", 1000);
    });

    it('escapes user input for the quotes surrounding the placeholder', async (): Promise<void> => {
        execMock.mockReturnValue(capture_create());
        await engine_create().run(descriptor_create({ action: 'echo "You said: {{user_input}}"' }), 'cost: $5 "net"');
        await engine_create().run(descriptor_create({ action: "echo 'You said: {{user_input}}'" }), "it's");

        expect(execMock.mock.calls.map((call: [string, number]): string => call[0])).toEqual([
            'echo "You said: cost: \\$5 \\"net\\""',
            "echo 'You said: it'\\''s'",
        ]);
    });

    it('prints double-quoted input through a real shell without added quotes', async (): Promise<void> => {
        const engine: GalaxyEngine = new GalaxyEngine({
            llm: null,
            shell: new SystemShellRunner(),
            stores,
            options: { shellTimeoutMs: 5000 },
        });
        const descriptor: GalaxyDescriptor = descriptor_create({ action: 'echo "You said: {{user_input}}"' });

        expect(result_format(await engine.run(descriptor, 'hi')).text).toBe('You said: hi');
        expect(result_format(await engine.run(descriptor, 'a `b` $HOME "c"')).text).toBe('You said: a `b` $HOME "c"');
    });

    it('returns a failed result when the shell cannot start', async (): Promise<void> => {
        execMock.mockImplementation((): ShellCapture => {
            throw new Error('spawn /bin/sh ENOENT');
        });
        const result: ExecutionResult = await engine_create().run(descriptor_create({ action: 'echo hi' }), null);

        expect(result_format(result)).toEqual({
            ok: false,
            text: '[error] ShellError: Cannot run shell action: spawn /bin/sh ENOENT',
            warnings: [],
        });
    });

    it('returns a failed result when nothing is executable', async (): Promise<void> => {
        const result: ExecutionResult = await engine_create().run(descriptor_create(), null);
        expect(result_format(result).text).toBe('[error] ConfigError: no executable action');
    });

    it('returns a failed LLM result and persists nothing', async (): Promise<void> => {
        completeMock.mockRejectedValue(new LLMError('OpenAI API error (401): bad key', 401));
        const result: ExecutionResult = await engine_create().run(llmDescriptor_create('{{user_input}}'), 'x');

        expect(result.status).toBe('failed');
        expect(result_format(result).text).toBe('[error] LLMError: OpenAI API error (401): bad key');
        expect(stores.stores_list()).toEqual([]);
    });

    it('fails LLM mode when no completer is configured', async (): Promise<void> => {
        const result: ExecutionResult = await engine_create(false).run(llmDescriptor_create('{{user_input}}'), 'x');
        expect(result_format(result).text)
            .toBe('[error] LLMError: No LLM provider configured (OPENAI_API_KEY is not set)');
    });

    it('writes to the first model and logs the choice when several are declared', async (): Promise<void> => {
        completeMock.mockResolvedValue('[1, 2]');
        const other: ModelSpec = { name: 'Other', type: 'json' };
        await engine_create().run(llmDescriptor_create('p', [FOOD_ENTRY, other]), null);

        expect(logs).toContain("multiple models declared; writing to first model 'FoodEntry'");
        expect(records_read('x', FOOD_ENTRY).map((r: GalaxyRecord): string => r.content)).toEqual(['[1,2]']);
        expect(records_read('x', other)).toEqual([]);
    });

    it('keeps the result and adds a warning when the store cannot be written', async (): Promise<void> => {
        completeMock.mockResolvedValue('{"a":1}');
        fs.writeFileSync(path.join(dataRoot, 'databases'), 'not a directory');

        const result: ExecutionResult = await engine_create().run(llmDescriptor_create('p'), null);
        const output = result_format(result);

        expect(output.ok).toBe(true);
        expect(output.text).toBe('{"a":1}');
        expect(output.persistedId).toBeUndefined();
        expect(output.warnings).toHaveLength(1);
        expect(output.warnings[0].startsWith('store warning: Cannot open store for x: ')).toBe(true);
    });

    it('never calls the LLM for shell-only definitions', async (): Promise<void> => {
        execMock.mockReturnValue(capture_create({ stdout: 'ok' }));
        await fc.assert(fc.asyncProperty(
            fc.string({ minLength: 1 }),
            fc.option(fc.string(), { nil: null }),
            async (action: string, input: string | null): Promise<void> => {
                await engine_create().run(descriptor_create({ action }), input);
            },
        ), { numRuns: 25 });

        expect(completeMock).not.toHaveBeenCalled();
    });
});
