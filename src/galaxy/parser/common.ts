/**
 * @file Shared Parsing Utilities
 *
 * @module galaxy/parser
 */

import yaml from 'js-yaml';
import type { ZodError } from 'zod';

/** Parse a YAML string into a JS value. Throws on syntax errors. */
export function yaml_parse(yamlStr: string): unknown {
    return yaml.load(yamlStr);
}

/**
 * Flatten Zod issues into one line: `[path] message; [path] message`.
 */
export function zodIssues_format(error: ZodError): string {
    return error.issues
        .map(i => `[${i.path.join('.')}] ${i.message}`)
        .join('; ');
}

/**
 * Derive a Galaxy name from a definition file path.
 * `apps/food-logger.yaml` → `food-logger`
 */
export function galaxyName_fromPath(filePath: string): string {
    const base: string = filePath.split(/[\\/]/).pop() ?? filePath;
    return base.replace(/\.ya?ml$/i, '');
}
