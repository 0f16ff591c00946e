/**
 * SQLITE backend for ObjectStore
 *
 * - One table per entity kind, place_amenity junction table for Place ↔ Amenity
 * - Foreign keys enforced (PRAGMA foreign_keys) with ON DELETE CASCADE
 * - Entities read or added in this session are tracked in an identity map;
 *   save() flushes new/dirty ones, link changes and deletions in one transaction
 * - Rows deleted but not yet flushed are hidden from every read. Every row a
 *   delete() cascaded to is removed by id, after the upserts, so the stored
 *   cascade follows the in-memory parent ids rather than the stored ones
 */

import Database from 'better-sqlite3';
import * as fs from 'fs/promises';
import * as path from 'path';
import { ConstraintViolationError } from '../../errors';
import type { ForeignKey, ObjectStore } from '../../interfaces';
import {
  ENTITY_KINDS,
  Entity,
  EntityKind,
  EntityOf,
  EntityRecord,
  ObjectKey,
  Place,
  hydrate,
  isEntityOf,
  keyOf,
  objectKey
} from '../../models';
import { collectDependents, foreignKeyValue } from '../../relations';
import { DEFAULT_STORE_PATHS } from '../../types';
import { JUNCTION_TABLE, SCHEMA, TABLES } from './schema';

export interface SQLiteObjectStoreConfig {
  dbPath?: string;
  walMode?: boolean;
  busyTimeout?: number;
}

type Row = Record<string, unknown>;

export class SQLiteObjectStore implements ObjectStore {
  readonly backend = 'SQLITE' as const;
  private db: Database.Database | null = null;
  readonly dbPath: string;
  private walMode: boolean;
  private busyTimeout: number;

  private identityMap = new Map<ObjectKey, Entity>();
  // Stored rows removed from the live set, deleted on save()
  private doomed = new Map<ObjectKey, Entity>();

  constructor(config: SQLiteObjectStoreConfig = {}) {
    this.dbPath = config.dbPath || DEFAULT_STORE_PATHS.SQLITE;
    this.walMode = config.walMode !== false; // WAL enabled by default
    this.busyTimeout = config.busyTimeout || 5000;
  }

  /**
   * Open the connection on first call, create the schema if absent and drop
   * everything tracked in memory.
   */
  async reload(): Promise<void> {
    if (!this.db) {
      await fs.mkdir(path.dirname(this.dbPath), { recursive: true });

      const db = new Database(this.dbPath);
      if (this.walMode) {
        db.pragma('journal_mode = WAL');
      }
      db.pragma(`busy_timeout = ${this.busyTimeout}`);
      db.pragma('foreign_keys = ON');
      this.db = db;
    }

    this.db.exec(SCHEMA);

    this.identityMap.clear();
    this.doomed.clear();
  }

  async close(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
    this.identityMap.clear();
    this.doomed.clear();
  }

  all<K extends EntityKind = EntityKind>(kind?: K): Map<ObjectKey, EntityOf<K>> {
    const db = this.requireDb();
    const result = new Map<ObjectKey, EntityOf<K>>();

    for (const current of kind ? [kind] : ENTITY_KINDS) {
      const rows = db
        .prepare<[], Row>(`SELECT * FROM ${TABLES[current].table} ORDER BY created_at, id`)
        .all();
      for (const row of rows) {
        const entity = this.resolveRow(current, row);
        if (entity && isEntityOf(entity, kind)) result.set(keyOf(entity), entity);
      }
    }

    for (const [key, entity] of this.identityMap) {
      if (entity.isNew && isEntityOf(entity, kind)) result.set(key, entity);
    }

    return result;
  }

  get<K extends EntityKind>(kind: K, id: string): EntityOf<K> | null {
    const key = objectKey(kind, id);
    if (this.doomed.has(key)) return null;

    const tracked = this.identityMap.get(key);
    if (tracked) return isEntityOf(tracked, kind) ? tracked : null;

    const row = this.requireDb()
      .prepare<[string], Row>(`SELECT * FROM ${TABLES[kind].table} WHERE id = ?`)
      .get(id);
    if (!row) return null;

    const entity = this.resolveRow(kind, row);
    return entity && isEntityOf(entity, kind) ? entity : null;
  }

  filterBy<K extends EntityKind>(kind: K, foreignKey: ForeignKey, parentId: string): EntityOf<K>[] {
    const { table, columns } = TABLES[kind];
    if (!columns.includes(foreignKey)) return [];

    const result = new Map<ObjectKey, EntityOf<K>>();
    const rows = this.requireDb()
      .prepare<[string], Row>(`SELECT * FROM ${table} WHERE ${foreignKey} = ? ORDER BY created_at, id`)
      .all(parentId);
    for (const row of rows) {
      const entity = this.resolveRow(kind, row);
      // A tracked entity may have been re-parented in memory
      if (entity && isEntityOf(entity, kind) && foreignKeyValue(entity, foreignKey) === parentId) {
        result.set(keyOf(entity), entity);
      }
    }

    for (const [key, entity] of this.identityMap) {
      if (isEntityOf(entity, kind) && foreignKeyValue(entity, foreignKey) === parentId) {
        result.set(key, entity);
      }
    }

    return [...result.values()];
  }

  add(entity: Entity): void {
    const key = keyOf(entity);
    this.identityMap.set(key, entity);
    this.doomed.delete(key);
  }

  delete(entity: Entity): void {
    const live = this.get(entity.kind, entity.id);
    if (!live) return;

    const dependents = collectDependents(live, (kind, foreignKey, parentId) =>
      this.filterBy(kind, foreignKey, parentId)
    );
    for (const target of [live, ...dependents]) {
      const key = keyOf(target);
      this.identityMap.delete(key);
      if (!target.isNew) this.doomed.set(key, target);
    }

    if (live.kind === 'Amenity') {
      for (const tracked of this.identityMap.values()) {
        if (tracked.kind === 'Place') tracked.unlinkAmenity(live.id);
      }
    }
  }

  count(kind?: EntityKind): number {
    const db = this.requireDb();
    let total = 0;

    for (const current of kind ? [kind] : ENTITY_KINDS) {
      const row = db
        .prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM ${TABLES[current].table}`)
        .get();
      total += row ? row.n : 0;
    }
    for (const entity of this.identityMap.values()) {
      if (entity.isNew && (!kind || entity.kind === kind)) total++;
    }
    for (const doomed of this.doomed.values()) {
      if (!kind || doomed.kind === kind) total--;
    }

    return total;
  }

  /**
   * Flush new/dirty entities parent-first, then link changes, then deletions.
   * Upserting first moves re-parented rows away from a deleted parent before
   * its ON DELETE CASCADE runs.
   *
   * @throws ConstraintViolationError if a write breaks a schema constraint or
   *   a written row would be cascaded away by a deletion; nothing is written
   *   and the pending changes stay pending
   */
  async save(): Promise<void> {
    const db = this.requireDb();
    const tracked = [...this.identityMap.values()];
    const pending = ENTITY_KINDS.flatMap(kind =>
      tracked.filter(entity => entity.kind === kind && (entity.isNew || entity.isDirty))
    );
    const relinked = tracked.filter((entity): entity is Place => entity.kind === 'Place' && entity.hasLinkChanges);

    if (this.doomed.size === 0 && pending.length === 0 && relinked.length === 0) {
      return;
    }

    const records = pending.map(entity => entity.recordForSave());

    const flush = db.transaction(() => {
      for (const record of records) {
        this.upsert(db, record);
      }
      for (const place of relinked) {
        db.prepare(`DELETE FROM ${JUNCTION_TABLE} WHERE place_id = ?`).run(place.id);
        const link = db.prepare(`INSERT INTO ${JUNCTION_TABLE} (place_id, amenity_id) VALUES (?, ?)`);
        for (const amenityId of place.amenity_ids) {
          link.run(place.id, amenityId);
        }
      }
      for (const entity of this.doomed.values()) {
        db.prepare(`DELETE FROM ${TABLES[entity.kind].table} WHERE id = ?`).run(entity.id);
      }
      if (this.doomed.size > 0) {
        for (const entity of pending) {
          const row = db.prepare(`SELECT 1 FROM ${TABLES[entity.kind].table} WHERE id = ?`).get(entity.id);
          if (!row) {
            throw new ConstraintViolationError(
              `${entity.kind} ${entity.id} references a deleted parent`,
              'SQLITE_CONSTRAINT_FOREIGNKEY'
            );
          }
        }
      }
    });

    try {
      flush();
    } catch (error) {
      throw translateSqliteError(error);
    }

    for (const entity of [...pending, ...relinked]) {
      entity.markPersisted();
    }
    this.doomed.clear();
  }

  private upsert(db: Database.Database, record: EntityRecord): void {
    const { table, columns } = TABLES[record.__class__];
    const allColumns = ['id', 'created_at', 'updated_at', ...columns];
    const updates = ['updated_at', ...columns].map(column => `${column} = excluded.${column}`);

    db.prepare(
      `INSERT INTO ${table} (${allColumns.join(', ')})
       VALUES (${allColumns.map(() => '?').join(', ')})
       ON CONFLICT(id) DO UPDATE SET ${updates.join(', ')}`
    ).run(...allColumns.map(column => record[column] ?? null));
  }

  /**
   * Tracked instance for a row, hydrating and tracking it on first sight.
   * Null when the row is scheduled for deletion.
   */
  private resolveRow(kind: EntityKind, row: Row): Entity | null {
    const id = typeof row.id === 'string' ? row.id : String(row.id);
    const key = objectKey(kind, id);
    if (this.doomed.has(key)) return null;

    const tracked = this.identityMap.get(key);
    if (tracked) return tracked;

    const record: Row = { ...row, __class__: kind };
    if (kind === 'Place') {
      record.amenity_ids = this.linkedAmenityIds(id);
    }
    const entity = hydrate(record);
    this.identityMap.set(key, entity);
    return entity;
  }

  private linkedAmenityIds(placeId: string): string[] {
    return this.requireDb()
      .prepare<[string], { amenity_id: string }>(
        `SELECT amenity_id FROM ${JUNCTION_TABLE} WHERE place_id = ? ORDER BY rowid`
      )
      .all(placeId)
      .map(row => row.amenity_id);
  }

  private requireDb(): Database.Database {
    if (!this.db) throw new Error('Database not initialized');
    return this.db;
  }
}

/**
 * Wrap SQLite constraint failures; pass anything else through.
 */
export function translateSqliteError(error: unknown): unknown {
  if (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    error.code.startsWith('SQLITE_CONSTRAINT')
  ) {
    return new ConstraintViolationError(error.message, error.code, { cause: error });
  }
  return error;
}
