/**
 * @file Shell Runner
 *
 * Runs a Galaxy's resolved action through the system shell with a hard
 * timeout and captures stdout, stderr and the exit code. Non-zero exits
 * and timeouts are returned, not thrown; only a shell that cannot be
 * started raises `ShellError`.
 *
 * @module engine
 */

import { spawnSync, type SpawnSyncReturns } from 'child_process';
import { ShellError } from '../core/errors.js';

const MAX_OUTPUT_BYTES: number = 10 * 1024 * 1024;

export interface ShellCapture {
    stdout: string;
    stderr: string;
    /** Null when the process was killed by a signal. */
    exitCode: number | null;
    timedOut: boolean;
}

/**
 * Shell capability boundary.
 */
export interface ShellRunner {
    exec(command: string, timeoutMs: number): ShellCapture;
}

/**
 * `ShellRunner` backed by `child_process.spawnSync` with `shell: true`.
 */
export class SystemShellRunner implements ShellRunner {
    constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

    /**
     * @throws {ShellError} When the shell could not be spawned
     */
    exec(command: string, timeoutMs: number): ShellCapture {
        const result: SpawnSyncReturns<string> = spawnSync(command, {
            shell: true,
            encoding: 'utf-8',
            timeout: timeoutMs,
            maxBuffer: MAX_OUTPUT_BYTES,
            env: this.env,
            stdio: ['ignore', 'pipe', 'pipe'],
        });

        const stdout: string = result.stdout ?? '';
        const stderr: string = result.stderr ?? '';

        if (result.error) {
            if (errorCode_get(result.error) === 'ETIMEDOUT') {
                return { stdout, stderr, exitCode: null, timedOut: true };
            }
            throw new ShellError(
                `Cannot run shell action: ${result.error.message}`,
                { exitCode: result.status, timedOut: false, stdout, stderr },
                { cause: result.error },
            );
        }

        return { stdout, stderr, exitCode: result.status, timedOut: false };
    }
}

function errorCode_get(error: Error): string | null {
    return 'code' in error && typeof error.code === 'string' ? error.code : null;
}
