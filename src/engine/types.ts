/**
 * @file Execution Engine Types
 *
 * Tagged unions for the engine's per-invocation state: the resolved
 * execution mode, the raw backend result, the canonical payload, the
 * persistence outcome and the terminal result.
 *
 * @module engine
 */

import type { ConfigError, LLMError, ParseError, ShellError, StoreError } from '../core/errors.js';
import type { ShellCapture } from './shell.js';

// ─── Mode ───────────────────────────────────────────────────────────────────

/** Resolved once per invocation by `mode_select`. */
export type ExecutionMode =
    | { kind: 'shell'; command: string }
    | { kind: 'llm'; prompt: string; model: string };

export type ExecutionBindings = Readonly<Record<string, string>>;

// ─── Payload ────────────────────────────────────────────────────────────────

export type JsonStructure = Record<string, unknown> | unknown[];

/**
 * Normalized result of an execution, before formatting and persistence.
 * A `json` payload keeps its source text, minus insignificant
 * whitespace; that text, not a re-serialization of `value`, is what is
 * displayed and stored.
 */
export type CanonicalPayload =
    | { kind: 'json'; value: JsonStructure; source: string }
    | { kind: 'text'; value: string };

// ─── Raw Results ────────────────────────────────────────────────────────────

export interface ShellRawResult {
    mode: 'shell';
    command: string;
    capture: ShellCapture;
    /** Set when the action exited non-zero or timed out. */
    error: ShellError | null;
    payload: CanonicalPayload;
}

export interface LlmRawResult {
    mode: 'llm';
    model: string;
    prompt: string;
    completion: string;
    payload: CanonicalPayload;
}

export type RawResult = ShellRawResult | LlmRawResult;

// ─── Persistence ────────────────────────────────────────────────────────────

export type PersistOutcome =
    | { status: 'skipped'; reason: string }
    | { status: 'persisted'; model: string; recordId: number }
    | { status: 'failed'; warning: StoreError };

// ─── Terminal Result ────────────────────────────────────────────────────────

export type ExecutionFailure = ParseError | ConfigError | LLMError | ShellError;

export type ExecutionResult =
    | { status: 'succeeded'; galaxy: string; raw: RawResult; persistence: PersistOutcome }
    | { status: 'failed'; galaxy: string; error: ExecutionFailure };

/**
 * Optional progress hooks. The CLI renders these as dim status lines.
 */
export interface EngineTelemetryHooks {
    status_emit?: (message: string) => void;
    log_emit?: (message: string) => void;
}

export interface EngineOptions {
    shellTimeoutMs: number;
}
