/**
 * @file Galaxy Error Taxonomy
 *
 * Every failure the runner reports is one of these classes. Primary
 * failures (parse, config, shell, LLM) end an invocation; `StoreError`
 * only ever travels as a warning next to a successful result.
 *
 * @module core/errors
 */

export type GalaxyErrorCode = 'PARSE' | 'CONFIG' | 'SHELL' | 'LLM' | 'STORE' | 'TEMPLATE';

/**
 * Base class. `code` names the failure kind.
 */
export abstract class GalaxyError extends Error {
    public abstract readonly code: GalaxyErrorCode;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Malformed or incomplete Galaxy definition.
 */
export class ParseError extends GalaxyError {
    public readonly code = 'PARSE';
    public readonly filePath: string | null;

    constructor(message: string, filePath: string | null = null, options?: { cause?: unknown }) {
        super(message, options);
        this.filePath = filePath;
    }
}

/** No executable mode could be resolved for a descriptor. */
export class ConfigError extends GalaxyError {
    public readonly code = 'CONFIG';
}

export interface ShellErrorDetails {
    exitCode: number | null;
    timedOut: boolean;
    stdout: string;
    stderr: string;
}

/**
 * Shell action failure. Non-zero exits and timeouts are attached to a
 * result; only a shell that never started fails the invocation.
 */
export class ShellError extends GalaxyError {
    public readonly code = 'SHELL';
    public readonly exitCode: number | null;
    public readonly timedOut: boolean;
    public readonly stdout: string;
    public readonly stderr: string;

    constructor(message: string, details: ShellErrorDetails, options?: { cause?: unknown }) {
        super(message, options);
        this.exitCode = details.exitCode;
        this.timedOut = details.timedOut;
        this.stdout = details.stdout;
        this.stderr = details.stderr;
    }
}

/**
 * Network, authentication or provider failure from the LLM capability.
 */
export class LLMError extends GalaxyError {
    public readonly code = 'LLM';
    public readonly status: number | null;

    constructor(message: string, status: number | null = null, options?: { cause?: unknown }) {
        super(message, options);
        this.status = status;
    }
}

/** Store unavailable or write failure. */
export class StoreError extends GalaxyError {
    public readonly code = 'STORE';
}

/** Raised by the template resolver under the `fail` policy. */
export class TemplateError extends GalaxyError {
    public readonly code = 'TEMPLATE';
    public readonly placeholder: string;

    constructor(message: string, placeholder: string) {
        super(message);
        this.placeholder = placeholder;
    }
}

/**
 * Render any thrown value as a message string.
 */
export function errorMessage_resolve(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
