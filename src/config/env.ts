/**
 * @file .env Loader
 *
 * Reads `KEY=value` lines from a `.env` file into the environment.
 * Variables already set in the environment are never overwritten.
 *
 * @module
 */

import fs from 'fs';
import path from 'path';

/**
 * Parse `.env` text into key/value pairs. Blank lines and `#` comments
 * are skipped; one pair of surrounding quotes is stripped from values.
 */
export function envText_parse(content: string): Record<string, string> {
    const entries: Record<string, string> = {};
    for (const line of content.split(/\r?\n/)) {
        const trimmed: string = line.trim();
        if (!trimmed || trimmed.startsWith('#') || !trimmed.includes('=')) continue;

        const [rawKey, ...valParts] = trimmed.split('=');
        const key: string = rawKey.replace(/^export\s+/, '').trim();
        if (!key) continue;
        entries[key] = valParts.join('=').trim().replace(/^(["'])(.*)\1$/, '$2');
    }
    return entries;
}

/**
 * Load `<dir>/.env` into `env`. Returns the keys that were applied.
 */
export function env_load(dir: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): string[] {
    const envPath: string = path.join(dir, '.env');
    if (!fs.existsSync(envPath)) return [];

    const applied: string[] = [];
    const entries: Record<string, string> = envText_parse(fs.readFileSync(envPath, 'utf-8'));
    for (const [key, value] of Object.entries(entries)) {
        if (!env[key]) {
            env[key] = value;
            applied.push(key);
        }
    }
    return applied;
}
