/**
 * @file TUI Renderer
 *
 * Terminal rendering for the Galaxy CLI: colors, spinner, status lines
 * and message styling. Command handlers produce plain `CommandLine`s;
 * this module is the only place that adds ANSI styling.
 *
 * @module
 */

import chalk from 'chalk';
import type { DisplayOutput } from '../format/ResultFormatter.js';
import type { StoreBootReport } from '../store/types.js';

// ─── ANSI Colors ────────────────────────────────────────────────────────────

/** Dark background optimized ANSI color palette. */
export const COLORS = {
    reset: '\x1b[0m',
    dim: '\x1b[90m',
    cyan: '\x1b[96m',
    magenta: '\x1b[95m',
    hideCursor: '\x1b[?25l',
    showCursor: '\x1b[?25h'
};

// ─── Message Styling ────────────────────────────────────────────────────────

export type LineKind = 'success' | 'error' | 'warning' | 'info' | 'dim' | 'plain';

/** One line of command output before styling. */
export interface CommandLine {
    kind: LineKind;
    text: string;
}

/**
 * Apply the palette for one message kind.
 */
export function message_style(line: CommandLine): string {
    switch (line.kind) {
        case 'success': return chalk.green(line.text);
        case 'error':   return chalk.red(line.text);
        case 'warning': return chalk.yellow(line.text);
        case 'info':    return chalk.cyan(line.text);
        case 'dim':     return chalk.gray(line.text);
        case 'plain':   return line.text;
    }
}

/**
 * Lines for a formatted Galaxy result: the output text, the stored
 * record id and any warnings.
 */
export function displayLines_build(output: DisplayOutput): CommandLine[] {
    const lines: CommandLine[] = [];
    if (output.text) {
        lines.push({ kind: output.ok ? 'plain' : 'error', text: output.text });
    }
    if (output.persistedId !== undefined) {
        lines.push({ kind: 'success', text: `saved entry #${output.persistedId}` });
    }
    for (const warning of output.warnings) {
        lines.push({ kind: 'warning', text: `warning: ${warning}` });
    }
    return lines;
}

/**
 * Lines reporting store preparation at REPL startup.
 */
export function bootLines_build(report: StoreBootReport): CommandLine[] {
    const lines: CommandLine[] = [];
    if (report.prepared.length > 0) {
        lines.push({ kind: 'dim', text: `prepared ${report.prepared.length} database(s): ${report.prepared.join(', ')}` });
    }
    for (const failure of report.failures) {
        lines.push({ kind: 'warning', text: `database for ${failure.galaxy} unavailable: ${failure.message}` });
    }
    return lines;
}

/**
 * Print lines to stdout, styled.
 */
export function lines_print(lines: CommandLine[]): void {
    for (const line of lines) {
        console.log(message_style(line));
    }
}

/**
 * Dim status line for engine telemetry, on stderr so one-shot output
 * stays clean.
 */
export function rendererStatus(message: string): void {
    console.error(`${COLORS.dim}● ${message}${COLORS.reset}`);
}

// ─── Spinner ────────────────────────────────────────────────────────────────

const SPINNER_FRAMES: readonly string[] = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

/**
 * Starts a spinner on the current line. Returns a stop function that
 * clears it. Does nothing when stdout is not a terminal.
 *
 * The first frame is drawn before returning. A shell action blocks the
 * timer while `spawnSync` runs, and that frame stays on screen.
 */
export function spinner_start(label: string): () => void {
    if (!process.stdout.isTTY) return (): void => {};

    let frameIdx: number = 0;
    const frame_draw = (): void => {
        const frame: string = SPINNER_FRAMES[frameIdx % SPINNER_FRAMES.length];
        process.stdout.write(`\r${COLORS.cyan}${frame}${COLORS.reset} ${COLORS.dim}${label}...${COLORS.reset}  `);
        frameIdx++;
    };

    process.stdout.write(COLORS.hideCursor);
    frame_draw();
    const timer: NodeJS.Timeout = setInterval(frame_draw, 80);

    return (): void => {
        clearInterval(timer);
        process.stdout.write(`\r${' '.repeat(label.length + 10)}\r`);
        process.stdout.write(COLORS.showCursor);
    };
}

/**
 * Colored REPL prompt. Inside an interactive Galaxy the prompt carries
 * its name.
 */
export function prompt_render(galaxy: string | null = null): string {
    if (galaxy) {
        return `${COLORS.magenta}${galaxy}${COLORS.reset}> `;
    }
    return `${COLORS.cyan}galaxy${COLORS.reset}> `;
}
