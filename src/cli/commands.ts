/**
 * @file CLI Command Registry
 *
 * Verbs of the `galaxy` shell (`list`, `run`, `db`, `entries`, `delete`,
 * `reset`, `env`, `help`, `exit`). Handlers return plain lines and never
 * print, so the REPL and the one-shot entry point share them.
 *
 * @module
 */

import type { GalaxyDescriptor, DiscoveryResult } from '../galaxy/types.js';
import type { ResolvedSettings } from '../config/settings.js';
import type { StoreFileInfo, GalaxyRecord } from '../store/types.js';
import type { GalaxyRunner, GalaxyEntries } from '../runner/GalaxyRunner.js';
import type { CommandLine } from './TuiRenderer.js';
import { errorLine_format } from '../runner/GalaxyRunner.js';
import type { DisplayOutput } from '../format/ResultFormatter.js';
import { bytes_format, record_label, result_format } from '../format/ResultFormatter.js';
import { displayLines_build } from './TuiRenderer.js';

/**
 * Request to enter an interactive Galaxy's sub-loop.
 */
export interface InteractiveRequest {
    descriptor: GalaxyDescriptor;
    initialInput: string | null;
}

export interface CommandOutcome {
    ok: boolean;
    lines: CommandLine[];
    exit?: boolean;
    interactive?: InteractiveRequest;
}

/**
 * Execution context provided to command handlers.
 */
export interface CommandContext {
    runner: GalaxyRunner;
    settings: ResolvedSettings;
    /** False for one-shot invocations, where interactive Galaxies run once. */
    interactiveAllowed: boolean;
}

/**
 * Signature for a command handler.
 */
export type CommandHandler = (args: string[], context: CommandContext) => Promise<CommandOutcome>;

const HELP_LINES: readonly string[] = [
    'commands:',
    '  run <galaxy> [input...]  - launch a galaxy',
    '  list / ls                - list available galaxies',
    '  db                       - list databases',
    '  entries <galaxy>         - list stored entries',
    '  delete <galaxy> <id...>  - delete stored entries',
    '  reset <galaxy>           - delete a galaxy database',
    '  env                      - check environment variables',
    '  help                     - show this help',
    '  exit / quit              - exit galaxy',
];

function line(kind: CommandLine['kind'], text: string): CommandLine {
    return { kind, text };
}

function usage_fail(usage: string): CommandOutcome {
    return { ok: false, lines: [line('error', `usage: ${usage}`)] };
}

function error_fail(error: unknown): CommandOutcome {
    return { ok: false, lines: [line('error', errorLine_format(error))] };
}

/**
 * Split a command line into words.
 */
export function commandLine_tokenize(input: string): string[] {
    return input.trim().split(/\s+/).filter((word: string): boolean => word.length > 0);
}

/**
 * Masked credential preview: first ten and last four characters. Short
 * keys are fully masked.
 */
export function keyPreview_mask(key: string): string {
    if (key.length < 16) return '****';
    return `${key.slice(0, 10)}...${key.slice(-4)}`;
}

/**
 * Parse entry ids; returns the offending word when one is not a
 * positive integer.
 */
export function entryIds_parse(words: string[]): { ok: true; ids: number[] } | { ok: false; invalid: string } {
    const ids: number[] = [];
    for (const word of words) {
        if (!/^\d+$/.test(word) || Number.parseInt(word, 10) < 1) {
            return { ok: false, invalid: word };
        }
        ids.push(Number.parseInt(word, 10));
    }
    return { ok: true, ids };
}

/**
 * Orchestrator for registering and dispatching CLI commands.
 */
export class CommandRegistry {
    private readonly handlers: Map<string, CommandHandler> = new Map();

    /**
     * Register a command handler under one or more verbs.
     */
    public register(names: string | string[], handler: CommandHandler): void {
        for (const name of Array.isArray(names) ? names : [names]) {
            this.handlers.set(name.toLowerCase(), handler);
        }
    }

    /**
     * Dispatch one input line. Empty lines succeed with no output.
     */
    public async execute(input: string, context: CommandContext): Promise<CommandOutcome> {
        const [verb, ...args] = commandLine_tokenize(input);
        if (verb === undefined) return { ok: true, lines: [] };

        const handler: CommandHandler | undefined = this.handlers.get(verb.toLowerCase());
        if (!handler) {
            return {
                ok: false,
                lines: [
                    line('error', `unknown command: ${verb}`),
                    line('dim', "type 'help' for available commands"),
                ],
            };
        }
        return handler(args, context);
    }

    /**
     * List all registered command verbs.
     */
    public commands_list(): string[] {
        return Array.from(this.handlers.keys()).sort();
    }
}

/**
 * Populate a registry with the standard handlers.
 */
export function register_defaultHandlers(registry: CommandRegistry): void {
    registry.register(['list', 'ls'], async (_args, ctx): Promise<CommandOutcome> => {
        const discovery: DiscoveryResult = ctx.runner.galaxies_list();
        const lines: CommandLine[] = [];
        if (discovery.galaxies.length === 0 && discovery.failures.length === 0) {
            return { ok: true, lines: [line('dim', `no galaxies found in ${ctx.runner.appsDir}`)] };
        }
        for (const galaxy of discovery.galaxies) {
            const summary: string = galaxy.description || galaxy.title;
            lines.push(line('plain', `  ${galaxy.name.padEnd(20)} ${summary}`.trimEnd()));
        }
        for (const failure of discovery.failures) {
            lines.push(line('warning', `  failed to load ${failure.name}: ${failure.message}`));
        }
        return { ok: true, lines };
    });

    registry.register('run', async (args, ctx): Promise<CommandOutcome> => {
        const [name, ...words] = args;
        if (name === undefined) return usage_fail('run <galaxy-name> [input...]');
        const userInput: string | null = words.length > 0 ? words.join(' ') : null;

        let descriptor: GalaxyDescriptor;
        try {
            descriptor = ctx.runner.galaxy_find(name);
        } catch (e: unknown) {
            return error_fail(e);
        }

        if (descriptor.interactive && ctx.interactiveAllowed) {
            return { ok: true, lines: [], interactive: { descriptor, initialInput: userInput } };
        }
        const output: DisplayOutput = result_format(await ctx.runner.descriptor_execute(descriptor, userInput));
        return { ok: output.ok, lines: displayLines_build(output) };
    });

    registry.register('db', async (_args, ctx): Promise<CommandOutcome> => {
        const stores: StoreFileInfo[] = ctx.runner.stores.stores_list();
        if (stores.length === 0) {
            return { ok: true, lines: [line('dim', 'no databases found')] };
        }
        return {
            ok: true,
            lines: stores.map((info: StoreFileInfo): CommandLine =>
                line('plain', `${info.galaxy.padEnd(20)} ${bytes_format(info.bytes).padStart(8)}`)),
        };
    });

    registry.register('entries', async (args, ctx): Promise<CommandOutcome> => {
        const [name] = args;
        if (name === undefined) return usage_fail('entries <galaxy-name>');

        let entries: GalaxyEntries;
        try {
            entries = ctx.runner.entries_list(name);
        } catch (e: unknown) {
            return error_fail(e);
        }
        const scope: string = `${entries.galaxy}/${entries.model}`;
        if (entries.records.length === 0) {
            return { ok: true, lines: [line('dim', `no entries in ${scope}`)] };
        }
        return {
            ok: true,
            lines: [
                line('info', `${entries.records.length} ${entries.records.length === 1 ? 'entry' : 'entries'} in ${scope}`),
                ...entries.records.map((record: GalaxyRecord): CommandLine =>
                    line('plain', `  #${String(record.id).padEnd(5)} ${record_label(record)}`)),
            ],
        };
    });

    registry.register('delete', async (args, ctx): Promise<CommandOutcome> => {
        const [name, ...words] = args;
        if (name === undefined || words.length === 0) return usage_fail('delete <galaxy-name> <id...>');

        const parsed = entryIds_parse(words);
        if (!parsed.ok) {
            return { ok: false, lines: [line('error', `invalid entry id '${parsed.invalid}'`)] };
        }
        try {
            const deleted: number = ctx.runner.entries_delete(name, parsed.ids);
            return { ok: true, lines: [line('success', `deleted ${deleted} ${deleted === 1 ? 'entry' : 'entries'}`)] };
        } catch (e: unknown) {
            return error_fail(e);
        }
    });

    registry.register('reset', async (args, ctx): Promise<CommandOutcome> => {
        const [name] = args;
        if (name === undefined) return usage_fail('reset <galaxy-name>');
        try {
            const existed: boolean = ctx.runner.store_reset(name);
            return {
                ok: true,
                lines: [existed ? line('success', `database for ${name} deleted`) : line('dim', `no database for ${name}`)],
            };
        } catch (e: unknown) {
            return error_fail(e);
        }
    });

    registry.register('env', async (_args, ctx): Promise<CommandOutcome> => {
        const { apiKey, model, appsDir, dataRoot } = ctx.settings;
        const lines: CommandLine[] = [
            line('plain', `openai_api_key: ${apiKey ? 'set' : 'not set'}`),
            line('plain', `model: ${model}`),
        ];
        if (apiKey) lines.push(line('plain', `key preview: ${keyPreview_mask(apiKey)}`));
        lines.push(line('dim', `apps dir: ${appsDir}`), line('dim', `data dir: ${dataRoot}`));
        return { ok: true, lines };
    });

    registry.register('help', async (): Promise<CommandOutcome> => {
        return { ok: true, lines: HELP_LINES.map((text: string): CommandLine => line('plain', text)) };
    });

    registry.register(['exit', 'quit'], async (): Promise<CommandOutcome> => {
        return { ok: true, lines: [], exit: true };
    });
}

/**
 * Registry populated with the standard handlers.
 */
export function commandRegistry_create(): CommandRegistry {
    const registry: CommandRegistry = new CommandRegistry();
    register_defaultHandlers(registry);
    return registry;
}
