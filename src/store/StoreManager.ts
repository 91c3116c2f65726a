/**
 * @file Store Manager
 *
 * Owns one SQLite store per Galaxy at `<dataRoot>/databases/<galaxy>.db`.
 * Handles live in an explicit registry keyed by Galaxy name; callers
 * open a handle within one invocation and close it before returning.
 * No connection outlives the call that opened it.
 *
 * Every failure leaves this class as a `StoreError`.
 *
 * @module store
 */

import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import type { GalaxyDescriptor, ModelSpec } from '../galaxy/types.js';
import type {
    GalaxyRecord,
    StoreBootFailure,
    StoreBootReport,
    StoreFileInfo,
    StoreHandle,
} from './types.js';
import { StoreError, errorMessage_resolve } from '../core/errors.js';
import { galaxyName_isValid } from '../galaxy/loader.js';
import { tableDdl_build, tableName_resolve } from './schema.js';

const STORE_EXTENSION: string = '.db';
const BUSY_TIMEOUT_MS: number = 5000;

interface RecordRow {
    id: number;
    created_at: string;
    content: string;
}

export class StoreManager {
    private readonly handles: Map<string, StoreHandle> = new Map();

    /**
     * @param dataRoot - Root data directory; stores live in its `databases/` child
     */
    constructor(private readonly dataRoot: string) {}

    /** Directory holding every store file. */
    public storeDir_get(): string {
        return path.join(this.dataRoot, 'databases');
    }

    /**
     * Deterministic store path for a Galaxy.
     *
     * @throws {StoreError} When the name could escape the store directory
     */
    public storePath_resolve(galaxy: string): string {
        if (!galaxyName_isValid(galaxy)) {
            throw new StoreError(`Invalid galaxy name for store: '${galaxy}'`);
        }
        return path.join(this.storeDir_get(), `${galaxy}${STORE_EXTENSION}`);
    }

    /**
     * Open the Galaxy's store, creating directory and file when absent.
     * Returns the registered handle when one is already open.
     */
    public store_ensure(galaxy: string): StoreHandle {
        const existing: StoreHandle | undefined = this.handles.get(galaxy);
        if (existing) return existing;

        const storePath: string = this.storePath_resolve(galaxy);
        try {
            fs.mkdirSync(path.dirname(storePath), { recursive: true });
            return this.handle_register(galaxy, storePath, new Database(storePath));
        } catch (e: unknown) {
            throw new StoreError(`Cannot open store for ${galaxy}: ${errorMessage_resolve(e)}`, { cause: e });
        }
    }

    /**
     * Open an existing store without creating one.
     *
     * @returns The handle, or null when the store file does not exist
     */
    public store_open(galaxy: string): StoreHandle | null {
        const existing: StoreHandle | undefined = this.handles.get(galaxy);
        if (existing) return existing;

        const storePath: string = this.storePath_resolve(galaxy);
        if (!fs.existsSync(storePath)) return null;
        try {
            return this.handle_register(galaxy, storePath, new Database(storePath, { fileMustExist: true }));
        } catch (e: unknown) {
            throw new StoreError(`Cannot open store for ${galaxy}: ${errorMessage_resolve(e)}`, { cause: e });
        }
    }

    /**
     * Create the model's table when absent. Existing rows are untouched.
     */
    public table_ensure(handle: StoreHandle, model: ModelSpec): void {
        this.statement_run(handle, `ensure table ${model.name}`, (): void => {
            handle.db.exec(tableDdl_build(model));
        });
    }

    /**
     * Insert one payload. Non-string payloads are stored as JSON text.
     *
     * @returns The new row id
     */
    public record_insert(handle: StoreHandle, model: ModelSpec, payload: unknown): number {
        const content: string = typeof payload === 'string' ? payload : JSON.stringify(payload);
        return this.statement_run(handle, `insert into ${model.name}`, (): number => {
            const info: Database.RunResult = handle.db
                .prepare(`INSERT INTO "${tableName_resolve(model)}" (content) VALUES (?)`)
                .run(content);
            return Number(info.lastInsertRowid);
        });
    }

    /**
     * All rows of a model, newest first.
     */
    public records_list(handle: StoreHandle, model: ModelSpec): GalaxyRecord[] {
        return this.statement_run(handle, `list ${model.name}`, (): GalaxyRecord[] => {
            const rows: unknown[] = handle.db
                .prepare(`SELECT id, created_at, content FROM "${tableName_resolve(model)}" ORDER BY id DESC`)
                .all();
            return rows.filter(row_isRecord).map(record_fromRow);
        });
    }

    /**
     * Delete rows by id inside one transaction.
     *
     * @returns Number of rows actually deleted
     */
    public records_delete(handle: StoreHandle, model: ModelSpec, ids: number[]): number {
        return this.statement_run(handle, `delete from ${model.name}`, (): number => {
            const statement = handle.db
                .prepare(`DELETE FROM "${tableName_resolve(model)}" WHERE id = ?`);
            const deleteAll = handle.db.transaction((targets: number[]): number =>
                targets.reduce((total: number, id: number): number => total + statement.run(id).changes, 0));
            return deleteAll(ids);
        });
    }

    /** Close and unregister one Galaxy's handle. No-op when none is open. */
    public store_close(galaxy: string): void {
        const handle: StoreHandle | undefined = this.handles.get(galaxy);
        if (!handle) return;
        this.handles.delete(galaxy);
        if (handle.db.open) handle.db.close();
    }

    /** Close every registered handle. */
    public stores_closeAll(): void {
        for (const galaxy of Array.from(this.handles.keys())) {
            this.store_close(galaxy);
        }
    }

    /**
     * Delete the Galaxy's entire store file. Explicit maintenance only.
     *
     * @returns True when a store file existed
     */
    public store_reset(galaxy: string): boolean {
        this.store_close(galaxy);
        const storePath: string = this.storePath_resolve(galaxy);
        const existed: boolean = fs.existsSync(storePath);
        try {
            for (const suffix of ['', '-wal', '-shm', '-journal']) {
                fs.rmSync(`${storePath}${suffix}`, { force: true });
            }
        } catch (e: unknown) {
            throw new StoreError(`Cannot reset store for ${galaxy}: ${errorMessage_resolve(e)}`, { cause: e });
        }
        return existed;
    }

    /**
     * Store files on disk, sorted by Galaxy name.
     */
    public stores_list(): StoreFileInfo[] {
        const dir: string = this.storeDir_get();
        if (!fs.existsSync(dir)) return [];

        return fs.readdirSync(dir, { withFileTypes: true })
            .filter((entry: fs.Dirent): boolean => entry.isFile() && entry.name.endsWith(STORE_EXTENSION))
            .map((entry: fs.Dirent): StoreFileInfo => {
                const filePath: string = path.join(dir, entry.name);
                return {
                    galaxy: entry.name.slice(0, -STORE_EXTENSION.length),
                    path: filePath,
                    bytes: fs.statSync(filePath).size,
                };
            })
            .sort((a: StoreFileInfo, b: StoreFileInfo): number => a.galaxy.localeCompare(b.galaxy));
    }

    /**
     * Prepare the store and tables of every Galaxy that declares models.
     * Each Galaxy is handled independently and closed afterwards.
     */
    public stores_boot(galaxies: GalaxyDescriptor[]): StoreBootReport {
        const prepared: string[] = [];
        const failures: StoreBootFailure[] = [];

        for (const galaxy of galaxies) {
            if (!galaxy.database) continue;
            try {
                const handle: StoreHandle = this.store_ensure(galaxy.name);
                for (const model of galaxy.database.models) {
                    this.table_ensure(handle, model);
                }
                prepared.push(galaxy.name);
            } catch (e: unknown) {
                failures.push({ galaxy: galaxy.name, message: errorMessage_resolve(e) });
            } finally {
                this.store_close(galaxy.name);
            }
        }

        return { prepared, failures };
    }

    private handle_register(galaxy: string, storePath: string, db: Database.Database): StoreHandle {
        db.pragma(`busy_timeout = ${BUSY_TIMEOUT_MS}`);
        const handle: StoreHandle = { galaxy, path: storePath, db };
        this.handles.set(galaxy, handle);
        return handle;
    }

    private statement_run<T>(handle: StoreHandle, operation: string, fn: () => T): T {
        try {
            return fn();
        } catch (e: unknown) {
            if (e instanceof StoreError) throw e;
            throw new StoreError(`Store ${handle.galaxy}: ${operation} failed: ${errorMessage_resolve(e)}`, { cause: e });
        }
    }
}

// ─── Row Decoding ───────────────────────────────────────────────────────────

function row_isRecord(row: unknown): row is RecordRow {
    if (row === null || typeof row !== 'object') return false;
    const candidate: Record<string, unknown> = { ...row };
    return typeof candidate['id'] === 'number'
        && typeof candidate['created_at'] === 'string'
        && typeof candidate['content'] === 'string';
}

/** Decode a row, attaching parsed JSON when the content is JSON text. */
function record_fromRow(row: RecordRow): GalaxyRecord {
    let parsed: unknown = null;
    try {
        parsed = JSON.parse(row.content);
    } catch {
        parsed = null;
    }
    return { id: row.id, created_at: row.created_at, content: row.content, parsed };
}
