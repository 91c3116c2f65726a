import { describe, it, expect } from 'vitest';
import { bytes_format, record_label, result_format, type DisplayOutput } from './ResultFormatter.js';
import { LLMError, ShellError, StoreError } from '../core/errors.js';
import type { ShellCapture } from '../engine/shell.js';
import type { ExecutionResult, PersistOutcome } from '../engine/types.js';
import type { GalaxyRecord } from '../store/types.js';

function shellResult(capture: ShellCapture, error: ShellError | null, persistence: PersistOutcome): ExecutionResult {
    return {
        status: 'succeeded',
        galaxy: 'g',
        raw: { mode: 'shell', command: 'cmd', capture, error, payload: { kind: 'text', value: capture.stdout.trim() } },
        persistence,
    };
}

const SKIPPED: PersistOutcome = { status: 'skipped', reason: 'no model declared' };

describe('result_format', (): void => {
    it('shows trimmed stdout and turns clean-exit stderr into a warning', (): void => {
        const output: DisplayOutput = result_format(shellResult(
            { stdout: '  hi\n', stderr: 'deprecated flag\n', exitCode: 0, timedOut: false }, null, SKIPPED));

        expect(output).toEqual({ ok: true, text: 'hi', warnings: ['deprecated flag'] });
    });

    it('marks a timed out shell action', (): void => {
        const capture: ShellCapture = { stdout: '', stderr: '', exitCode: null, timedOut: true };
        const error: ShellError = new ShellError('shell action timed out after 250 ms', capture);

        expect(result_format(shellResult(capture, error, SKIPPED)).text).toBe('[error] timed out after 250 ms');
    });

    it('marks a shell action killed by a signal', (): void => {
        const capture: ShellCapture = { stdout: 'x', stderr: '', exitCode: null, timedOut: false };
        const error: ShellError = new ShellError('shell action was killed by a signal', capture);

        expect(result_format(shellResult(capture, error, SKIPPED)).text).toBe('x\n[error] killed by signal');
    });

    it('renders JSON payloads compactly with the persisted id', (): void => {
        const output: DisplayOutput = result_format({
            status: 'succeeded',
            galaxy: 'food-logger',
            raw: {
                mode: 'llm',
                model: 'gpt-4o',
                prompt: 'p',
                completion: '{ "meal_name": "toast" }',
                payload: { kind: 'json', value: { meal_name: 'toast' }, source: '{"meal_name":"toast"}' },
            },
            persistence: { status: 'persisted', model: 'FoodEntry', recordId: 7 },
        });

        expect(output).toEqual({ ok: true, text: '{"meal_name":"toast"}', persistedId: 7, warnings: [] });
    });

    it('keeps the result and adds a store warning when persistence failed', (): void => {
        const output: DisplayOutput = result_format({
            status: 'succeeded',
            galaxy: 'g',
            raw: { mode: 'llm', model: 'm', prompt: 'p', completion: 'plain', payload: { kind: 'text', value: 'plain' } },
            persistence: { status: 'failed', warning: new StoreError('disk full') },
        });

        expect(output).toEqual({ ok: true, text: 'plain', warnings: ['store warning: disk full'] });
    });

    it('renders failures with the error class name', (): void => {
        const output: DisplayOutput = result_format({
            status: 'failed',
            galaxy: 'g',
            error: new LLMError('OpenAI request timed out after 60000 ms'),
        });

        expect(output).toEqual({ ok: false, text: '[error] LLMError: OpenAI request timed out after 60000 ms', warnings: [] });
    });
});

describe('bytes_format', (): void => {
    it('uses bytes, kilobytes and megabytes', (): void => {
        expect(bytes_format(512)).toBe('512b');
        expect(bytes_format(3 * 1024)).toBe('3k');
        expect(bytes_format(12288 + 100)).toBe('12k');
        expect(bytes_format(1.5 * 1024 * 1024)).toBe('1.5m');
    });
});

describe('record_label', (): void => {
    function record_create(content: string, parsed: unknown): GalaxyRecord {
        return { id: 4, created_at: '2026-03-14 08:15:00', content, parsed };
    }

    it('labels meals with their calories', (): void => {
        expect(record_label(record_create('', { meal_name: 'Oatmeal', calories: 310 }))).toBe('"Oatmeal" (310 cal)');
        expect(record_label(record_create('', { meal_name: 'Tea' }))).toBe('"Tea" (? cal)');
    });

    it('falls back to common name fields', (): void => {
        expect(record_label(record_create('', { title: 'Morning run', description: 'x' }))).toBe('"Morning run"');
    });

    it('falls back to id and date for text and arrays', (): void => {
        expect(record_label(record_create('plain', null))).toBe('Entry #4 (2026-03-14)');
        expect(record_label(record_create('[1]', [1]))).toBe('Entry #4 (2026-03-14)');
    });
});
