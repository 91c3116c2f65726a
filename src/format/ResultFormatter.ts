/**
 * @file Result Formatter
 *
 * Renders an `ExecutionResult` into plain display text plus the
 * persisted record id. Styling for the terminal happens in the CLI;
 * everything here is plain strings so it can be asserted exactly.
 *
 * @module format
 */

import type { CanonicalPayload, ExecutionResult, ShellRawResult } from '../engine/types.js';
import type { GalaxyRecord } from '../store/types.js';

/** Prefix of every error line in display text. */
export const ERROR_MARKER: string = '[error]';

export interface DisplayOutput {
    ok: boolean;
    text: string;
    persistedId?: number;
    warnings: string[];
}

/**
 * Format one execution result for display.
 */
export function result_format(result: ExecutionResult): DisplayOutput {
    if (result.status === 'failed') {
        return {
            ok: false,
            text: `${ERROR_MARKER} ${result.error.name}: ${result.error.message}`,
            warnings: [],
        };
    }

    const warnings: string[] = [];
    const text: string = result.raw.mode === 'shell'
        ? shellText_format(result.raw, warnings)
        : payload_render(result.raw.payload);

    const output: DisplayOutput = { ok: true, text, warnings };
    switch (result.persistence.status) {
        case 'persisted':
            output.persistedId = result.persistence.recordId;
            break;
        case 'failed':
            warnings.push(`store warning: ${result.persistence.warning.message}`);
            break;
        case 'skipped':
            break;
    }
    return output;
}

/**
 * Human-readable payload: compact JSON for structures, raw text otherwise.
 */
export function payload_render(payload: CanonicalPayload): string {
    return payload.kind === 'json' ? payload.source : payload.value;
}

function shellText_format(raw: ShellRawResult, warnings: string[]): string {
    const stdout: string = raw.capture.stdout.trim();
    const stderr: string = raw.capture.stderr.trim();

    if (!raw.error) {
        if (stderr) warnings.push(stderr);
        return stdout;
    }

    const marker: string = raw.error.timedOut
        ? `${ERROR_MARKER} ${raw.error.message.replace(/^shell action /, '')}`
        : raw.error.exitCode === null
            ? `${ERROR_MARKER} killed by signal`
            : `${ERROR_MARKER} exit code ${raw.error.exitCode}`;

    return [stdout, stderr, marker].filter((line: string): boolean => line.length > 0).join('\n');
}

// ─── Listings ───────────────────────────────────────────────────────────────

/**
 * Compact byte size: `512b`, `3k`, `1.5m`.
 */
export function bytes_format(bytes: number): string {
    if (bytes < 1024) return `${bytes}b`;
    if (bytes < 1024 * 1024) return `${Math.round(bytes / 1024)}k`;
    return `${(bytes / (1024 * 1024)).toFixed(1)}m`;
}

/**
 * Display label for a stored record. Food-log style records show meal
 * and calories; other JSON records use a common name field; everything
 * else falls back to id and date.
 */
export function record_label(record: GalaxyRecord): string {
    const parsed: unknown = record.parsed;
    if (parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)) {
        const fields: Record<string, unknown> = { ...parsed };
        if ('meal_name' in fields) {
            const calories: string = fields['calories'] === undefined ? '?' : String(fields['calories']);
            return `"${String(fields['meal_name'])}" (${calories} cal)`;
        }
        for (const key of ['name', 'title', 'description']) {
            if (key in fields) return `"${String(fields[key])}"`;
        }
    }
    const date: string = record.created_at ? record.created_at.slice(0, 10) : 'unknown';
    return `Entry #${record.id} (${date})`;
}
