/**
 * @file Galaxy Definition Schemas
 *
 * Zod runtime schemas for Galaxy YAML documents. Optional fields carry
 * their defaults here so a definition only declares what differs.
 * Cross-field rules (prompt required when `useLLM` is set, unique model
 * names, a `target` that names a declared model) are refinements on the
 * owning object.
 *
 * @module galaxy/parser/schemas
 */

import { z } from 'zod';

/** Fallback model when neither the document nor the settings name one. */
export const DEFAULT_LLM_MODEL: string = 'gpt-4o';

/** Model names become table names, so only plain identifiers pass. */
const ModelNameSchema = z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'model name must be a plain identifier');

// ─── Database ───────────────────────────────────────────────────────────────

export const ModelSpecSchema = z.object({
    name: ModelNameSchema,
    type: z.enum(['json']).default('json')
});

export const DatabaseSchema = z
    .object({
        models: z.array(ModelSpecSchema).default([]),
        target: ModelNameSchema.optional()
    })
    .superRefine((db, ctx): void => {
        const seen: Set<string> = new Set();
        db.models.forEach((model, index): void => {
            const key: string = model.name.toLowerCase();
            if (seen.has(key)) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ['models', index, 'name'],
                    message: `duplicate model name '${model.name}'`
                });
            }
            seen.add(key);
        });

        if (db.target !== undefined && !db.models.some((m): boolean => m.name === db.target)) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['target'],
                message: `target '${db.target}' is not a declared model`
            });
        }
    });

// ─── LLM ────────────────────────────────────────────────────────────────────

export const LLMSchema = z
    .object({
        provider: z.enum(['openai']).default('openai'),
        model:    z.string().min(1).optional(),
        useLLM:   z.boolean().default(false),
        prompt:   z.string().optional()
    })
    .superRefine((llm, ctx): void => {
        if (llm.useLLM && (llm.prompt === undefined || llm.prompt.trim() === '')) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['prompt'],
                message: 'useLLM is true but no prompt is defined'
            });
        }
    });

// ─── Galaxy (full document) ─────────────────────────────────────────────────

export const GalaxySchema = z.object({
    name:        z.string().min(1, 'galaxy name is required'),
    description: z.string().default(''),
    action:      z.string().min(1).optional(),
    llm:         LLMSchema.optional(),
    database:    DatabaseSchema.optional(),
    interactive: z.boolean().default(false)
});

export type RawLLM      = z.infer<typeof LLMSchema>;
export type RawDatabase = z.infer<typeof DatabaseSchema>;
