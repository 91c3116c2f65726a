/**
 * @file Galaxy Loader
 *
 * Reads Galaxy definition files from disk and discovers every definition
 * in an apps directory. Discovery loads each file independently: one
 * malformed file is reported and the rest still load.
 *
 * @module galaxy
 */

import fs from 'fs';
import path from 'path';
import type { DiscoveryFailure, DiscoveryResult, GalaxyDescriptor } from './types.js';
import { ParseError, errorMessage_resolve } from '../core/errors.js';
import { descriptor_parse } from './parser/descriptor.js';
import { galaxyName_fromPath } from './parser/common.js';

/** Galaxy names double as filenames, so they may not contain separators. */
const GALAXY_NAME_PATTERN: RegExp = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

const DEFINITION_EXTENSIONS: readonly string[] = ['.yaml', '.yml'];

export interface LoadOptions {
    defaultModel?: string;
}

/**
 * Whether `name` is usable as a Galaxy name.
 */
export function galaxyName_isValid(name: string): boolean {
    return GALAXY_NAME_PATTERN.test(name) && !name.includes('..');
}

/**
 * Load and validate one definition file.
 *
 * @throws {ParseError} When the file cannot be read or fails validation
 */
export function galaxy_load(filePath: string, options: LoadOptions = {}): GalaxyDescriptor {
    let content: string;
    try {
        content = fs.readFileSync(filePath, 'utf-8');
    } catch (e: unknown) {
        throw new ParseError(`Cannot read ${filePath}: ${errorMessage_resolve(e)}`, filePath, { cause: e });
    }

    return descriptor_parse(content, {
        name: galaxyName_fromPath(filePath),
        sourcePath: filePath,
        defaultModel: options.defaultModel,
    });
}

/**
 * Resolve the definition file for a Galaxy name. `.yaml` wins over `.yml`.
 *
 * @returns Absolute path, or null when the name is invalid or no file exists
 */
export function galaxyPath_resolve(appsDir: string, name: string): string | null {
    if (!galaxyName_isValid(name)) return null;

    for (const ext of DEFINITION_EXTENSIONS) {
        const candidate: string = path.resolve(appsDir, `${name}${ext}`);
        if (fs.existsSync(candidate) && fs.statSync(candidate).isFile()) {
            return candidate;
        }
    }
    return null;
}

/**
 * List definition files in an apps directory, sorted by filename.
 * A missing directory yields an empty list.
 */
export function definitionFiles_list(appsDir: string): string[] {
    if (!fs.existsSync(appsDir)) return [];

    return fs.readdirSync(appsDir, { withFileTypes: true })
        .filter((entry: fs.Dirent): boolean =>
            entry.isFile() && DEFINITION_EXTENSIONS.includes(path.extname(entry.name)))
        .map((entry: fs.Dirent): string => path.join(appsDir, entry.name))
        .sort();
}

/**
 * Load every definition in `appsDir`.
 *
 * When both `x.yaml` and `x.yml` exist only the `.yaml` file is used,
 * matching `galaxyPath_resolve`. A file whose name is not a valid Galaxy
 * name is reported as a failure, since it could never be run.
 */
export function galaxies_discover(appsDir: string, options: LoadOptions = {}): DiscoveryResult {
    const galaxies: GalaxyDescriptor[] = [];
    const failures: DiscoveryFailure[] = [];
    const seen: Set<string> = new Set();

    const files: string[] = definitionFiles_list(appsDir)
        .sort((a: string, b: string): number => extensionRank(a) - extensionRank(b) || a.localeCompare(b));

    for (const filePath of files) {
        const name: string = galaxyName_fromPath(filePath);
        if (seen.has(name)) continue;
        seen.add(name);

        if (!galaxyName_isValid(name)) {
            failures.push({ name, filePath, message: `Invalid galaxy name '${name}': use letters, digits, '.', '_' or '-'` });
            continue;
        }
        try {
            galaxies.push(galaxy_load(filePath, options));
        } catch (e: unknown) {
            failures.push({ name, filePath, message: errorMessage_resolve(e) });
        }
    }

    galaxies.sort((a: GalaxyDescriptor, b: GalaxyDescriptor): number => a.name.localeCompare(b.name));
    failures.sort((a: DiscoveryFailure, b: DiscoveryFailure): number => a.name.localeCompare(b.name));
    return { galaxies, failures };
}

function extensionRank(filePath: string): number {
    return DEFINITION_EXTENSIONS.indexOf(path.extname(filePath));
}
