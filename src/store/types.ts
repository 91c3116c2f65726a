/**
 * @file Store Type Definitions
 *
 * Types for the per-Galaxy persistence layer. Each Galaxy owns exactly
 * one SQLite file; each declared model is one table inside it.
 *
 * @module store
 */

import type Database from 'better-sqlite3';

/**
 * An open store. Handles are owned by the `StoreManager` registry and
 * closed through it.
 *
 * @property galaxy - Galaxy name the store belongs to
 * @property path - Absolute path of the SQLite file
 * @property db - Open connection
 */
export interface StoreHandle {
    galaxy: string;
    path: string;
    db: Database.Database;
}

/**
 * A persisted row.
 *
 * @property created_at - SQLite `CURRENT_TIMESTAMP` text (UTC, `YYYY-MM-DD HH:MM:SS`)
 * @property parsed - Decoded JSON when `content` is JSON text, else null
 */
export interface GalaxyRecord {
    id: number;
    created_at: string;
    content: string;
    parsed: unknown;
}

/** One store file on disk, as shown by the `db` command. */
export interface StoreFileInfo {
    galaxy: string;
    path: string;
    bytes: number;
}

/** Column declaration produced from a model type. */
export interface ColumnSpec {
    name: string;
    definition: string;
}

export interface StoreBootFailure {
    galaxy: string;
    message: string;
}

export interface StoreBootReport {
    prepared: string[];
    failures: StoreBootFailure[];
}
