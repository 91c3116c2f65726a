/**
 * @file Canonical Payload
 *
 * Turns backend output into the payload that is formatted and stored.
 *
 * @module engine
 */

import type { CanonicalPayload, JsonStructure } from './types.js';

const FENCE_PATTERN: RegExp = /^```[A-Za-z0-9_-]*\s*\n([\s\S]*?)\n?```$/;

/**
 * Remove one Markdown code fence wrapping the whole text, if present.
 */
export function codeFence_strip(text: string): string {
    const trimmed: string = text.trim();
    const match: RegExpMatchArray | null = trimmed.match(FENCE_PATTERN);
    return match ? match[1].trim() : trimmed;
}

function json_isStructure(value: unknown): value is JsonStructure {
    return value !== null && typeof value === 'object';
}

/**
 * Payload for an LLM completion. Objects and arrays become structured
 * payloads; anything else, including bare JSON scalars, stays raw text.
 */
export function payload_fromCompletion(completion: string): CanonicalPayload {
    const candidate: string = codeFence_strip(completion);
    try {
        const value: unknown = JSON.parse(candidate);
        if (json_isStructure(value)) {
            return { kind: 'json', value, source: jsonText_compact(candidate) };
        }
    } catch {
        // not JSON: the raw text is the payload
    }
    return { kind: 'text', value: completion };
}

/**
 * Drop whitespace outside string literals from valid JSON text. Tokens,
 * numbers included, are kept exactly as written.
 */
export function jsonText_compact(text: string): string {
    let out: string = '';
    let inString: boolean = false;
    let escaped: boolean = false;
    for (const ch of text) {
        if (inString) {
            out += ch;
            if (escaped) escaped = false;
            else if (ch === '\\') escaped = true;
            else if (ch === '"') inString = false;
        } else if (ch === '"') {
            inString = true;
            out += ch;
        } else if (!/\s/.test(ch)) {
            out += ch;
        }
    }
    return out;
}

/** Payload for a shell action: its trimmed stdout. */
export function payload_fromShell(stdout: string): CanonicalPayload {
    return { kind: 'text', value: stdout.trim() };
}

/** Text handed to the store for insertion. */
export function payload_storable(payload: CanonicalPayload): string {
    return payload.kind === 'json' ? payload.source : payload.value;
}
