/**
 * @file Galaxy Runner
 *
 * Facade the CLI talks to: finds and loads a Galaxy by name, hands it to
 * the engine and formats the result. Also exposes the store-side
 * operations (`entries`, `delete`, `reset`) scoped to one Galaxy.
 *
 * @module runner
 */

import type { DiscoveryResult, GalaxyDescriptor, ModelSpec } from '../galaxy/types.js';
import type { GalaxyRecord, StoreBootReport, StoreHandle } from '../store/types.js';
import type { ExecutionResult, EngineTelemetryHooks } from '../engine/types.js';
import type { DisplayOutput } from '../format/ResultFormatter.js';
import type { ResolvedSettings } from '../config/settings.js';
import { ConfigError, GalaxyError, ParseError } from '../core/errors.js';
import { galaxies_discover, galaxy_load, galaxyName_isValid, galaxyPath_resolve } from '../galaxy/loader.js';
import { GalaxyEngine, targetModel_resolve } from '../engine/GalaxyEngine.js';
import { SystemShellRunner } from '../engine/shell.js';
import { OpenAIClient } from '../llm/openai.js';
import { StoreManager } from '../store/StoreManager.js';
import { ERROR_MARKER, result_format } from '../format/ResultFormatter.js';

export interface GalaxyRunnerDeps {
    appsDir: string;
    defaultModel: string;
    engine: GalaxyEngine;
    stores: StoreManager;
}

/** Records of a Galaxy's target model, newest first. */
export interface GalaxyEntries {
    galaxy: string;
    model: string;
    records: GalaxyRecord[];
}

export class GalaxyRunner {
    constructor(private readonly deps: GalaxyRunnerDeps) {}

    public get stores(): StoreManager {
        return this.deps.stores;
    }

    public get appsDir(): string {
        return this.deps.appsDir;
    }

    /**
     * Discover every definition under the apps directory.
     */
    public galaxies_list(): DiscoveryResult {
        return galaxies_discover(this.deps.appsDir, { defaultModel: this.deps.defaultModel });
    }

    /**
     * Load one Galaxy by name.
     *
     * @throws {ConfigError} When the name is invalid or has no definition file
     * @throws {ParseError} When the definition is invalid
     */
    public galaxy_find(name: string): GalaxyDescriptor {
        if (!galaxyName_isValid(name)) {
            throw new ConfigError(`Invalid Galaxy name '${name}'`);
        }
        const filePath: string | null = galaxyPath_resolve(this.deps.appsDir, name);
        if (!filePath) {
            throw new ConfigError(`Galaxy '${name}' not found in ${this.deps.appsDir}`);
        }
        return galaxy_load(filePath, { defaultModel: this.deps.defaultModel });
    }

    /**
     * Run a Galaxy once and return the raw engine result. Lookup and
     * parse failures come back as failed results.
     */
    public async execute(name: string, userInput: string | null): Promise<ExecutionResult> {
        let descriptor: GalaxyDescriptor;
        try {
            descriptor = this.galaxy_find(name);
        } catch (e: unknown) {
            if (e instanceof ConfigError || e instanceof ParseError) {
                return { status: 'failed', galaxy: name, error: e };
            }
            throw e;
        }
        return this.descriptor_execute(descriptor, userInput);
    }

    /**
     * Run an already loaded Galaxy once.
     */
    public async descriptor_execute(descriptor: GalaxyDescriptor, userInput: string | null): Promise<ExecutionResult> {
        return this.deps.engine.run(descriptor, userInput);
    }

    /**
     * Run a Galaxy once and format the result for display.
     */
    public async run(name: string, userInput: string | null): Promise<DisplayOutput> {
        return result_format(await this.execute(name, userInput));
    }

    /**
     * Stored records of a Galaxy's target model. A Galaxy that has never
     * written anything has no records.
     *
     * @throws {ConfigError} When the Galaxy declares no model
     */
    public entries_list(name: string): GalaxyEntries {
        const descriptor: GalaxyDescriptor = this.galaxy_find(name);
        const model: ModelSpec = this.targetModel_require(descriptor);
        const stores: StoreManager = this.deps.stores;

        const handle: StoreHandle | null = stores.store_open(descriptor.name);
        if (!handle) return { galaxy: descriptor.name, model: model.name, records: [] };
        try {
            stores.table_ensure(handle, model);
            return { galaxy: descriptor.name, model: model.name, records: stores.records_list(handle, model) };
        } finally {
            stores.store_close(descriptor.name);
        }
    }

    /**
     * Delete records of a Galaxy's target model. Returns the number removed.
     *
     * @throws {ConfigError} When the Galaxy declares no model
     */
    public entries_delete(name: string, ids: number[]): number {
        const descriptor: GalaxyDescriptor = this.galaxy_find(name);
        const model: ModelSpec = this.targetModel_require(descriptor);
        const stores: StoreManager = this.deps.stores;

        const handle: StoreHandle | null = stores.store_open(descriptor.name);
        if (!handle) return 0;
        try {
            stores.table_ensure(handle, model);
            return stores.records_delete(handle, model, ids);
        } finally {
            stores.store_close(descriptor.name);
        }
    }

    /**
     * Delete a Galaxy's store file. Returns whether a file existed.
     *
     * @throws {ConfigError} When the name is invalid
     */
    public store_reset(name: string): boolean {
        if (!galaxyName_isValid(name)) {
            throw new ConfigError(`Invalid Galaxy name '${name}'`);
        }
        return this.deps.stores.store_reset(name);
    }

    /**
     * Create stores and tables for every discoverable Galaxy with models.
     */
    public stores_boot(): StoreBootReport {
        return this.deps.stores.stores_boot(this.galaxies_list().galaxies);
    }

    private targetModel_require(descriptor: GalaxyDescriptor): ModelSpec {
        const model: ModelSpec | null = targetModel_resolve(descriptor);
        if (!model) {
            throw new ConfigError(`Galaxy '${descriptor.name}' declares no database models`);
        }
        return model;
    }
}

/**
 * Display text for an error thrown by a runner operation.
 */
export function errorLine_format(error: unknown): string {
    if (error instanceof GalaxyError) return `${ERROR_MARKER} ${error.name}: ${error.message}`;
    return `${ERROR_MARKER} ${error instanceof Error ? error.message : String(error)}`;
}

/**
 * Assemble a runner backed by the system shell, the OpenAI client and
 * SQLite stores under the configured data root.
 */
export function runner_assemble(settings: ResolvedSettings, telemetryHooks?: EngineTelemetryHooks): GalaxyRunner {
    const stores: StoreManager = new StoreManager(settings.dataRoot);
    const llm: OpenAIClient | null = settings.apiKey
        ? new OpenAIClient({ apiKey: settings.apiKey, baseUrl: settings.baseUrl, timeoutMs: settings.llmTimeoutMs })
        : null;

    const engine: GalaxyEngine = new GalaxyEngine({
        llm,
        shell: new SystemShellRunner(),
        stores,
        options: { shellTimeoutMs: settings.shellTimeoutMs },
        telemetryHooks,
    });

    return new GalaxyRunner({ appsDir: settings.appsDir, defaultModel: settings.model, engine, stores });
}
