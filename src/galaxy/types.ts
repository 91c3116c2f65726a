/**
 * @file Galaxy Descriptor Types
 *
 * In-memory form of a Galaxy definition after validation. Descriptors
 * are built once per run by the loader and never mutated.
 *
 * @module galaxy
 */

// ─── Models ─────────────────────────────────────────────────────────────────

/**
 * Storage shape of a declared model. New shapes are added as variants
 * here and in `columns_forModelType`.
 */
export type ModelType = 'json';

export interface ModelSpec {
    name: string;
    type: ModelType;
}

export interface DatabaseConfig {
    models: ModelSpec[];
    /** Model that receives automatic writes; defaults to the first model. */
    target: string | null;
}

// ─── LLM ────────────────────────────────────────────────────────────────────

export type LLMProviderName = 'openai';

export interface LLMConfig {
    provider: LLMProviderName;
    model: string;
    useLLM: boolean;
    /** Template with `{{identifier}}` placeholders. Empty when undeclared. */
    prompt: string;
}

// ─── Descriptor ─────────────────────────────────────────────────────────────

/**
 * A validated Galaxy.
 *
 * @property name - Canonical identifier, the definition's filename without extension
 * @property title - The document's own `name` field, used for display
 * @property sourcePath - File the descriptor was loaded from, or null for in-memory documents
 */
export interface GalaxyDescriptor {
    name: string;
    title: string;
    description: string;
    action: string | null;
    llm: LLMConfig | null;
    database: DatabaseConfig | null;
    interactive: boolean;
    sourcePath: string | null;
}

/** One definition file that could not be loaded during discovery. */
export interface DiscoveryFailure {
    name: string;
    filePath: string;
    message: string;
}

export interface DiscoveryResult {
    galaxies: GalaxyDescriptor[];
    failures: DiscoveryFailure[];
}
