/**
 * @file Galaxy CLI REPL
 *
 * Interactive readline REPL over the command registry. A Galaxy marked
 * `interactive` takes over the prompt: every line runs the Galaxy once
 * with the line as `user_input`, until `exit` returns to the shell.
 *
 * @module
 */

import * as readline from 'readline';
import type { GalaxyDescriptor } from '../galaxy/types.js';
import type { DisplayOutput } from '../format/ResultFormatter.js';
import type { CommandContext, CommandOutcome, CommandRegistry, InteractiveRequest } from './commands.js';
import type { CommandLine } from './TuiRenderer.js';
import { result_format } from '../format/ResultFormatter.js';
import { errorLine_format } from '../runner/GalaxyRunner.js';
import { COLORS, displayLines_build, lines_print, prompt_render, spinner_start } from './TuiRenderer.js';

// ─── Session ────────────────────────────────────────────────────────────────

/** Outcome of one REPL line. */
export interface ReplStep {
    lines: CommandLine[];
    /** Galaxy owning the prompt after this line, or null for the shell. */
    activeGalaxy: string | null;
    exit: boolean;
}

const SUBLOOP_EXIT_WORDS: ReadonlySet<string> = new Set(['exit', 'quit']);

/**
 * Line-level REPL state, independent of readline.
 */
export class ReplSession {
    private active: GalaxyDescriptor | null = null;

    constructor(
        private readonly registry: CommandRegistry,
        private readonly context: CommandContext,
        private readonly busy_signal: (label: string) => () => void = (): (() => void) => (): void => {},
    ) {}

    public activeGalaxy_get(): string | null {
        return this.active ? this.active.name : null;
    }

    /**
     * Handle one input line.
     */
    public async line_handle(input: string): Promise<ReplStep> {
        const trimmed: string = input.trim();
        if (this.active) {
            return this.subloopLine_handle(this.active, trimmed);
        }

        const stop: () => void = trimmed ? this.busy_signal('working') : (): void => {};
        let outcome: CommandOutcome;
        try {
            outcome = await this.registry.execute(trimmed, this.context);
        } finally {
            stop();
        }

        if (outcome.interactive) {
            return this.subloop_enter(outcome.interactive);
        }
        return { lines: outcome.lines, activeGalaxy: null, exit: outcome.exit === true };
    }

    private async subloop_enter(request: InteractiveRequest): Promise<ReplStep> {
        const descriptor: GalaxyDescriptor = request.descriptor;
        this.active = descriptor;
        const lines: CommandLine[] = [
            { kind: 'info', text: `entering ${descriptor.title} interactive mode` },
            { kind: 'dim', text: "type 'exit' to return" },
        ];
        if (request.initialInput) {
            lines.push(...await this.galaxy_run(descriptor, request.initialInput));
        }
        return { lines, activeGalaxy: descriptor.name, exit: false };
    }

    private async subloopLine_handle(descriptor: GalaxyDescriptor, input: string): Promise<ReplStep> {
        if (!input) {
            return { lines: [], activeGalaxy: descriptor.name, exit: false };
        }
        if (SUBLOOP_EXIT_WORDS.has(input.toLowerCase())) {
            this.active = null;
            return { lines: [{ kind: 'dim', text: `left ${descriptor.title}` }], activeGalaxy: null, exit: false };
        }
        return { lines: await this.galaxy_run(descriptor, input), activeGalaxy: descriptor.name, exit: false };
    }

    private async galaxy_run(descriptor: GalaxyDescriptor, input: string): Promise<CommandLine[]> {
        const stop: () => void = this.busy_signal(descriptor.name);
        try {
            const output: DisplayOutput = result_format(await this.context.runner.descriptor_execute(descriptor, input));
            return displayLines_build(output);
        } finally {
            stop();
        }
    }
}

// ─── Readline Loop ──────────────────────────────────────────────────────────

/**
 * Tab completion over the registered verbs for the first word.
 */
export function replCompleter_create(verbs: string[]): readline.Completer {
    return (line: string): [string[], string] => {
        const words: string[] = line.split(/\s+/);
        const last: string = words[words.length - 1] || '';
        if (words.length === 1 && !line.endsWith(' ')) {
            return [verbs.filter((verb: string): boolean => verb.startsWith(last)), last];
        }
        return [[], last];
    };
}

/**
 * Start the interactive REPL. Resolves when the user exits or input closes.
 */
export function repl_start(registry: CommandRegistry, context: CommandContext): Promise<void> {
    const session: ReplSession = new ReplSession(registry, context, spinner_start);
    const rl: readline.Interface = readline.createInterface({
        input: process.stdin,
        output: process.stdout,
        prompt: prompt_render(),
        completer: replCompleter_create(registry.commands_list()),
    });

    console.log(`${COLORS.cyan}galaxy${COLORS.reset} ${COLORS.dim}type 'help' for available commands${COLORS.reset}`);

    return new Promise<void>((resolve: () => void): void => {
        let pending: Promise<void> = Promise.resolve();

        const line_process = async (line: string): Promise<void> => {
            try {
                const step: ReplStep = await session.line_handle(line);
                lines_print(step.lines);
                if (step.exit) {
                    rl.close();
                    return;
                }
                rl.setPrompt(prompt_render(step.activeGalaxy));
            } catch (e: unknown) {
                lines_print([{ kind: 'error', text: errorLine_format(e) }]);
            }
            rl.prompt();
        };

        rl.on('line', (line: string): void => {
            pending = pending.then((): Promise<void> => line_process(line));
        });
        rl.on('close', (): void => {
            pending.then((): void => {
                console.log(`${COLORS.dim}Goodbye.${COLORS.reset}`);
                resolve();
            }, resolve);
        });

        rl.prompt();
    });
}
