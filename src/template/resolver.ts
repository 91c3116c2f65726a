/**
 * @file Template Resolver
 *
 * Substitutes `{{identifier}}` placeholders in action and prompt
 * templates. Whitespace inside the braces is ignored, so
 * `{{ user_input }}` and `{{user_input}}` are the same token.
 *
 * Unknown placeholders are left verbatim unless the caller selects a
 * different policy.
 *
 * @module template
 */

import { TemplateError } from '../core/errors.js';

export type TemplateBindings = Readonly<Record<string, unknown>>;

/** What happens to a placeholder with no binding. */
export type UnknownPlaceholderPolicy = 'verbatim' | 'empty' | 'fail';

export interface TemplateResolveOptions {
    unknown?: UnknownPlaceholderPolicy;
    /**
     * Applied to every substituted value, e.g. shell quoting. `offset` is
     * the placeholder's position in the template.
     */
    escape?: (value: string, offset: number) => string;
}

function placeholderPattern_create(): RegExp {
    return /\{\{\s*([A-Za-z_][A-Za-z0-9_]*)\s*\}\}/g;
}

/**
 * String form of a binding. Objects are rendered as JSON; null and
 * undefined become the empty string.
 */
export function binding_stringify(value: unknown): string {
    if (value === null || value === undefined) return '';
    if (typeof value === 'string') return value;
    if (typeof value === 'object') return JSON.stringify(value);
    return String(value);
}

/**
 * Resolve every placeholder in `template` against `bindings`.
 *
 * @throws {TemplateError} Only under the `fail` policy
 */
export function template_resolve(
    template: string,
    bindings: TemplateBindings,
    options: TemplateResolveOptions = {}
): string {
    const policy: UnknownPlaceholderPolicy = options.unknown ?? 'verbatim';
    const escape: (value: string, offset: number) => string = options.escape ?? ((value: string): string => value);

    return template.replace(placeholderPattern_create(), (token: string, id: string, offset: number): string => {
        if (Object.prototype.hasOwnProperty.call(bindings, id)) {
            return escape(binding_stringify(bindings[id]), offset);
        }
        switch (policy) {
            case 'empty':
                return '';
            case 'fail':
                throw new TemplateError(`Unknown placeholder: ${token}`, id);
            case 'verbatim':
                return token;
        }
    });
}

// ─── Shell Quoting ──────────────────────────────────────────────────────────

/**
 * POSIX single-quote escaping: the result is one shell word whose value
 * is exactly `value`.
 */
export function shellWord_quote(value: string): string {
    return `'${value.replace(/'/g, `'\\''`)}'`;
}

/** Quoting state of the shell text preceding a placeholder. */
export type ShellQuoteContext = 'bare' | 'single' | 'double';

/**
 * Quoting state at `offset` in a POSIX shell command template.
 */
export function shellQuoteContext_at(template: string, offset: number): ShellQuoteContext {
    let context: ShellQuoteContext = 'bare';
    for (let i: number = 0; i < offset; i++) {
        const ch: string = template[i];
        if (context === 'single') {
            if (ch === "'") context = 'bare';
        } else if (ch === '\\') {
            i++;
        } else if (ch === '"') {
            context = context === 'double' ? 'bare' : 'double';
        } else if (ch === "'" && context === 'bare') {
            context = 'single';
        }
    }
    return context;
}

/**
 * Escape `value` so that, placed in `context`, the shell reads it back
 * unchanged.
 */
export function shellValue_escape(value: string, context: ShellQuoteContext): string {
    switch (context) {
        case 'bare':
            return shellWord_quote(value);
        case 'single':
            return value.replace(/'/g, `'\\''`);
        case 'double':
            return value.replace(/[\\"$`]/g, (ch: string): string => `\\${ch}`);
    }
}

/**
 * Escape function for `template_resolve` over a shell command template.
 */
export function shellEscape_create(template: string): (value: string, offset: number) => string {
    return (value: string, offset: number): string => shellValue_escape(value, shellQuoteContext_at(template, offset));
}
