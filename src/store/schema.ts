/**
 * @file Store Schema
 *
 * Pure mapping from declared model types to table DDL.
 *
 * @module store
 */

import type { ModelSpec, ModelType } from '../galaxy/types.js';
import type { ColumnSpec } from './types.js';

const BASE_COLUMNS: readonly ColumnSpec[] = [
    { name: 'id',         definition: 'INTEGER PRIMARY KEY AUTOINCREMENT' },
    { name: 'created_at', definition: 'DATETIME DEFAULT CURRENT_TIMESTAMP' },
];

/**
 * Columns for a model type. Every type shares `id` and `created_at`.
 */
export function columns_forModelType(type: ModelType): ColumnSpec[] {
    switch (type) {
        case 'json':
            return [...BASE_COLUMNS, { name: 'content', definition: 'TEXT NOT NULL' }];
    }
}

/** Table name for a model: the lower-cased model name. */
export function tableName_resolve(model: ModelSpec): string {
    const table: string = model.name.toLowerCase();
    if (!/^[a-z_][a-z0-9_]*$/.test(table)) {
        throw new Error(`Invalid model name for table: '${model.name}'`);
    }
    return table;
}

/**
 * `CREATE TABLE IF NOT EXISTS` statement for a model.
 */
export function tableDdl_build(model: ModelSpec): string {
    const columns: string = columns_forModelType(model.type)
        .map((column: ColumnSpec): string => `${column.name} ${column.definition}`)
        .join(', ');
    return `CREATE TABLE IF NOT EXISTS "${tableName_resolve(model)}" (${columns})`;
}
