/**
 * @file Galaxy Execution Engine
 *
 * Runs one Galaxy invocation: select the mode, resolve the template,
 * call the shell or LLM backend, derive the canonical payload and
 * persist it when the Galaxy declares models.
 *
 * Failures of the primary action end the invocation as a `failed`
 * result rather than an exception. Persistence failures only attach a
 * warning.
 *
 * @module engine
 */

import type { GalaxyDescriptor, ModelSpec } from '../galaxy/types.js';
import type { LlmCompleter } from '../llm/types.js';
import type { StoreManager } from '../store/StoreManager.js';
import type { StoreHandle } from '../store/types.js';
import type { ShellCapture, ShellRunner } from './shell.js';
import type {
    CanonicalPayload,
    EngineOptions,
    EngineTelemetryHooks,
    ExecutionBindings,
    ExecutionMode,
    ExecutionResult,
    LlmRawResult,
    PersistOutcome,
    RawResult,
    ShellRawResult,
} from './types.js';
import {
    ConfigError,
    LLMError,
    ShellError,
    StoreError,
    errorMessage_resolve,
} from '../core/errors.js';
import { shellEscape_create, template_resolve } from '../template/resolver.js';
import { payload_fromCompletion, payload_fromShell, payload_storable } from './payload.js';

export interface GalaxyEngineDeps {
    /** Null when no credential is configured; LLM mode then fails with LLMError. */
    llm: LlmCompleter | null;
    shell: ShellRunner;
    stores: StoreManager;
    options: EngineOptions;
    telemetryHooks?: EngineTelemetryHooks;
}

/**
 * Resolve the execution mode. `llm` wins when `useLLM` is true.
 *
 * @throws {ConfigError} When neither an enabled `llm` block nor an `action` exists
 */
export function mode_select(descriptor: GalaxyDescriptor): ExecutionMode {
    if (descriptor.llm && descriptor.llm.useLLM) {
        return { kind: 'llm', prompt: descriptor.llm.prompt, model: descriptor.llm.model };
    }
    if (descriptor.action) {
        return { kind: 'shell', command: descriptor.action };
    }
    throw new ConfigError('no executable action');
}

/**
 * Model receiving automatic writes: the declared `target`, else the first.
 */
export function targetModel_resolve(descriptor: GalaxyDescriptor): ModelSpec | null {
    const database = descriptor.database;
    if (!database || database.models.length === 0) return null;
    if (database.target) {
        return database.models.find((m: ModelSpec): boolean => m.name === database.target) ?? database.models[0];
    }
    return database.models[0];
}

export class GalaxyEngine {
    private readonly telemetryHooks: EngineTelemetryHooks;

    constructor(private readonly deps: GalaxyEngineDeps) {
        this.telemetryHooks = deps.telemetryHooks ?? {};
    }

    private status_emit(message: string): void {
        this.telemetryHooks.status_emit?.(message);
    }

    private log_emit(message: string): void {
        this.telemetryHooks.log_emit?.(message);
    }

    /**
     * Execute one invocation of `descriptor`.
     */
    public async run(descriptor: GalaxyDescriptor, userInput: string | null): Promise<ExecutionResult> {
        const bindings: ExecutionBindings = { user_input: userInput ?? '' };

        let mode: ExecutionMode;
        try {
            mode = mode_select(descriptor);
        } catch (e: unknown) {
            const error: ConfigError = e instanceof ConfigError ? e : new ConfigError(errorMessage_resolve(e), { cause: e });
            return { status: 'failed', galaxy: descriptor.name, error };
        }

        let raw: RawResult;
        try {
            raw = mode.kind === 'llm'
                ? await this.llm_execute(mode.prompt, mode.model, bindings)
                : this.shell_execute(mode.command, bindings);
        } catch (e: unknown) {
            if (e instanceof LLMError || e instanceof ShellError) {
                return { status: 'failed', galaxy: descriptor.name, error: e };
            }
            throw e;
        }

        const persistence: PersistOutcome = this.payload_persist(descriptor, raw);
        return { status: 'succeeded', galaxy: descriptor.name, raw, persistence };
    }

    // ─── Backends ───────────────────────────────────────────────────────────

    private shell_execute(template: string, bindings: ExecutionBindings): ShellRawResult {
        const command: string = template_resolve(template, bindings, { escape: shellEscape_create(template) });
        const timeoutMs: number = this.deps.options.shellTimeoutMs;
        this.status_emit(`running shell action (timeout ${timeoutMs} ms)`);

        let capture: ShellCapture;
        try {
            capture = this.deps.shell.exec(command, timeoutMs);
        } catch (e: unknown) {
            if (e instanceof ShellError) throw e;
            throw new ShellError(
                `Cannot run shell action: ${errorMessage_resolve(e)}`,
                { exitCode: null, timedOut: false, stdout: '', stderr: '' },
                { cause: e },
            );
        }
        return {
            mode: 'shell',
            command,
            capture,
            error: shellError_fromCapture(capture, timeoutMs),
            payload: payload_fromShell(capture.stdout),
        };
    }

    private async llm_execute(template: string, model: string, bindings: ExecutionBindings): Promise<LlmRawResult> {
        if (!this.deps.llm) {
            throw new LLMError('No LLM provider configured (OPENAI_API_KEY is not set)');
        }
        const prompt: string = template_resolve(template, bindings);
        this.status_emit(`querying ${model}`);

        let completion: string;
        try {
            completion = await this.deps.llm.complete(model, prompt);
        } catch (e: unknown) {
            if (e instanceof LLMError) throw e;
            throw new LLMError(errorMessage_resolve(e), null, { cause: e });
        }

        const payload: CanonicalPayload = payload_fromCompletion(completion);
        this.log_emit(`completion parsed as ${payload.kind}`);
        return { mode: 'llm', model, prompt, completion, payload };
    }

    // ─── Persistence ────────────────────────────────────────────────────────

    private payload_persist(descriptor: GalaxyDescriptor, raw: RawResult): PersistOutcome {
        const model: ModelSpec | null = targetModel_resolve(descriptor);
        if (!descriptor.database || !model) {
            return { status: 'skipped', reason: 'no model declared' };
        }
        if (raw.mode === 'shell' && raw.error) {
            return { status: 'skipped', reason: 'shell action failed' };
        }
        if (descriptor.database.models.length > 1 && !descriptor.database.target) {
            this.log_emit(`multiple models declared; writing to first model '${model.name}'`);
        }

        const stores: StoreManager = this.deps.stores;
        try {
            const handle: StoreHandle = stores.store_ensure(descriptor.name);
            for (const declared of descriptor.database.models) {
                stores.table_ensure(handle, declared);
            }
            const recordId: number = stores.record_insert(handle, model, payload_storable(raw.payload));
            this.log_emit(`stored record ${recordId} in ${descriptor.name}/${model.name.toLowerCase()}`);
            return { status: 'persisted', model: model.name, recordId };
        } catch (e: unknown) {
            const warning: StoreError = e instanceof StoreError
                ? e
                : new StoreError(errorMessage_resolve(e), { cause: e });
            return { status: 'failed', warning };
        } finally {
            stores.store_close(descriptor.name);
        }
    }
}

/**
 * ShellError describing a non-zero exit or timeout, or null on success.
 */
export function shellError_fromCapture(capture: ShellCapture, timeoutMs: number): ShellError | null {
    const details = {
        exitCode: capture.exitCode,
        timedOut: capture.timedOut,
        stdout: capture.stdout,
        stderr: capture.stderr,
    };
    if (capture.timedOut) {
        return new ShellError(`shell action timed out after ${timeoutMs} ms`, details);
    }
    if (capture.exitCode !== 0) {
        const reason: string = capture.exitCode === null ? 'was killed by a signal' : `exited with code ${capture.exitCode}`;
        return new ShellError(`shell action ${reason}`, details);
    }
    return null;
}
