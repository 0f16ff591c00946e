/**
 * FILE backend for ObjectStore
 *
 * Keeps the live set in memory and persists it as one JSON snapshot
 * ({ "<Kind>.<id>": record }). Snapshots are replaced atomically with
 * write-file-atomic, so a failed save leaves the previous snapshot intact.
 *
 * No referential checks: a dangling id is stored as-is.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import writeFileAtomic from 'write-file-atomic';
import type { ForeignKey, ObjectStore } from '../../interfaces';
import {
  Entity,
  EntityKind,
  EntityOf,
  EntityRecord,
  ObjectKey,
  hydrate,
  isEntityOf,
  keyOf,
  objectKey
} from '../../models';
import { collectDependents, foreignKeyValue } from '../../relations';
import { DEFAULT_STORE_PATHS } from '../../types';

export interface FileObjectStoreConfig {
  filePath?: string;
}

export type Snapshot = Record<string, EntityRecord>;

export class FileObjectStore implements ObjectStore {
  readonly backend = 'FILE' as const;
  readonly filePath: string;
  private objects = new Map<ObjectKey, Entity>();

  constructor(config: FileObjectStoreConfig = {}) {
    this.filePath = config.filePath || DEFAULT_STORE_PATHS.FILE;
  }

  all<K extends EntityKind = EntityKind>(kind?: K): Map<ObjectKey, EntityOf<K>> {
    const result = new Map<ObjectKey, EntityOf<K>>();
    for (const [key, entity] of this.objects) {
      if (isEntityOf(entity, kind)) result.set(key, entity);
    }
    return result;
  }

  get<K extends EntityKind>(kind: K, id: string): EntityOf<K> | null {
    const entity = this.objects.get(objectKey(kind, id));
    return entity && isEntityOf(entity, kind) ? entity : null;
  }

  filterBy<K extends EntityKind>(kind: K, foreignKey: ForeignKey, parentId: string): EntityOf<K>[] {
    return [...this.all(kind).values()].filter(entity => foreignKeyValue(entity, foreignKey) === parentId);
  }

  add(entity: Entity): void {
    this.objects.set(keyOf(entity), entity);
  }

  delete(entity: Entity): void {
    const key = keyOf(entity);
    if (!this.objects.has(key)) return;

    const dependents = collectDependents(entity, (kind, foreignKey, parentId) =>
      this.filterBy(kind, foreignKey, parentId)
    );
    this.objects.delete(key);
    for (const dependent of dependents) {
      this.objects.delete(keyOf(dependent));
    }

    if (entity.kind === 'Amenity') {
      for (const place of this.all('Place').values()) {
        place.unlinkAmenity(entity.id);
      }
    }
  }

  count(kind?: EntityKind): number {
    return kind ? this.all(kind).size : this.objects.size;
  }

  async save(): Promise<void> {
    const snapshot: Snapshot = {};
    for (const [key, entity] of this.objects) {
      snapshot[key] = entity.recordForSave();
    }

    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await writeFileAtomic(this.filePath, JSON.stringify(snapshot, null, 2), { encoding: 'utf-8' });

    for (const entity of this.objects.values()) {
      entity.markPersisted();
    }
  }

  /**
   * Rebuild the live set from the snapshot.
   * An absent or unreadable snapshot yields an empty live set; so does a
   * record that cannot be rebuilt, for that record only.
   */
  async reload(): Promise<void> {
    this.objects = new Map();

    let snapshot: unknown;
    try {
      snapshot = JSON.parse(await fs.readFile(this.filePath, 'utf-8'));
    } catch (error) {
      if (!isMissingFile(error)) {
        console.warn(`⚠️  Ignoring unreadable snapshot ${this.filePath}:`, error instanceof Error ? error.message : error);
      }
      return;
    }
    if (typeof snapshot !== 'object' || snapshot === null || Array.isArray(snapshot)) {
      console.warn(`⚠️  Ignoring snapshot ${this.filePath}: not a JSON object`);
      return;
    }

    for (const raw of Object.values(snapshot)) {
      try {
        const entity = hydrate(raw);
        this.objects.set(keyOf(entity), entity);
      } catch (error) {
        console.warn(`⚠️  Skipping unreadable record in ${this.filePath}:`, error instanceof Error ? error.message : error);
      }
    }
  }

  async close(): Promise<void> {
    // Nothing held open between saves
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
