#!/usr/bin/env node
/**
 * @file Galaxy CLI Entry Point
 *
 * Without arguments starts the REPL. With arguments runs one command and
 * exits with status 0 on success, 1 on failure.
 *
 * Usage:
 *   npx tsx src/cli/main.ts
 *   npx tsx src/cli/main.ts run hello-world
 *   npx tsx src/cli/main.ts run food-logger two eggs and toast
 *   npx tsx src/cli/main.ts list
 *
 * @module
 */

import type { ResolvedSettings } from '../config/settings.js';
import type { EngineTelemetryHooks } from '../engine/types.js';
import type { CommandContext, CommandOutcome, CommandRegistry } from './commands.js';
import { env_load } from '../config/env.js';
import { SettingsService } from '../config/settings.js';
import { runner_assemble, errorLine_format, type GalaxyRunner } from '../runner/GalaxyRunner.js';
import { commandRegistry_create } from './commands.js';
import { bootLines_build, lines_print, rendererStatus } from './TuiRenderer.js';
import { repl_start } from './Repl.js';

async function main(argv: string[]): Promise<number> {
    env_load();
    const settings: ResolvedSettings = new SettingsService().snapshot();
    const interactive: boolean = argv.length === 0;

    const telemetryHooks: EngineTelemetryHooks = interactive
        ? { log_emit: rendererStatus }
        : { status_emit: rendererStatus, log_emit: rendererStatus };
    const runner: GalaxyRunner = runner_assemble(settings, telemetryHooks);
    const registry: CommandRegistry = commandRegistry_create();
    const context: CommandContext = { runner, settings, interactiveAllowed: interactive };

    try {
        if (interactive) {
            lines_print(bootLines_build(runner.stores_boot()));
            await repl_start(registry, context);
            return 0;
        }
        const outcome: CommandOutcome = await registry.execute(argv.join(' '), context);
        lines_print(outcome.lines);
        return outcome.ok ? 0 : 1;
    } finally {
        runner.stores.stores_closeAll();
    }
}

main(process.argv.slice(2)).then(
    (code: number): void => {
        process.exitCode = code;
    },
    (e: unknown): void => {
        console.error(errorLine_format(e));
        process.exitCode = 1;
    },
);
