/**
 * @file Galaxy Descriptor Parser
 *
 * Parses one Galaxy YAML document into a `GalaxyDescriptor`. The
 * document is validated against `GalaxySchema` at the boundary before
 * any field access.
 *
 * @module galaxy/parser
 */

import type { DatabaseConfig, GalaxyDescriptor, LLMConfig } from '../types.js';
import { ParseError, errorMessage_resolve } from '../../core/errors.js';
import { yaml_parse, zodIssues_format } from './common.js';
import { DEFAULT_LLM_MODEL, GalaxySchema, type RawDatabase, type RawLLM } from './schemas.js';

export interface DescriptorParseOptions {
    /** Canonical name; defaults to the document's own `name`. */
    name?: string;
    /** Recorded on the descriptor and on any ParseError. */
    sourcePath?: string | null;
    /** Model used when the `llm` block names none. */
    defaultModel?: string;
}

/**
 * Parse a Galaxy YAML string into a descriptor.
 *
 * @throws {ParseError} On invalid YAML, a non-mapping document or schema violations
 */
export function descriptor_parse(yamlStr: string, options: DescriptorParseOptions = {}): GalaxyDescriptor {
    const sourcePath: string | null = options.sourcePath ?? null;

    let raw: unknown;
    try {
        raw = yaml_parse(yamlStr);
    } catch (e: unknown) {
        throw new ParseError(`Invalid YAML: ${errorMessage_resolve(e)}`, sourcePath, { cause: e });
    }

    if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
        throw new ParseError('Invalid galaxy: document must be a mapping', sourcePath);
    }

    const result = GalaxySchema.safeParse(raw);
    if (!result.success) {
        throw new ParseError(`Invalid galaxy: ${zodIssues_format(result.error)}`, sourcePath);
    }

    const doc = result.data;
    return {
        name:        options.name ?? doc.name,
        title:       doc.name,
        description: doc.description,
        action:      doc.action ?? null,
        llm:         doc.llm ? llm_build(doc.llm, options.defaultModel ?? DEFAULT_LLM_MODEL) : null,
        database:    doc.database ? database_build(doc.database) : null,
        interactive: doc.interactive,
        sourcePath,
    };
}

function llm_build(raw: RawLLM, defaultModel: string): LLMConfig {
    return {
        provider: raw.provider,
        model:    raw.model ?? defaultModel,
        useLLM:   raw.useLLM,
        prompt:   raw.prompt ?? '',
    };
}

/** An empty `models` list means no store at all. */
function database_build(raw: RawDatabase): DatabaseConfig | null {
    if (raw.models.length === 0) return null;
    return {
        models: raw.models.map(m => ({ name: m.name, type: m.type })),
        target: raw.target ?? null,
    };
}
