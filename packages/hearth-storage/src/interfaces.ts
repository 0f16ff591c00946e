/**
 * ObjectStore - the storage facade contract
 *
 * Both backends implement it identically; callers never reach past it.
 * - FileObjectStore: whole live set as one JSON snapshot
 * - SQLiteObjectStore: one table per entity kind + place_amenity junction table
 *
 * Only save(), reload() and close() touch durable media.
 */

import type { Entity, EntityKind, EntityOf, ObjectKey } from './models';
import type { StoreBackend } from './types';

/**
 * Attribute naming an owning entity
 */
export type ForeignKey = 'state_id' | 'city_id' | 'user_id' | 'place_id';

export interface ObjectStore {
  readonly backend: StoreBackend;

  /**
   * Every live object, or only those of one kind, keyed "<Kind>.<id>"
   */
  all<K extends EntityKind = EntityKind>(kind?: K): Map<ObjectKey, EntityOf<K>>;

  /**
   * The live object with this id, or null. Never throws for a missing id.
   */
  get<K extends EntityKind>(kind: K, id: string): EntityOf<K> | null;

  /**
   * Live objects of a kind whose owning attribute equals parentId
   */
  filterBy<K extends EntityKind>(kind: K, foreignKey: ForeignKey, parentId: string): EntityOf<K>[];

  /**
   * Register a freshly constructed entity as live (durable after save())
   */
  add(entity: Entity): void;

  /**
   * Flush pending creations, updates, deletions and link changes.
   * Idempotent; a no-op when nothing is pending.
   */
  save(): Promise<void>;

  /**
   * Remove an entity and everything it owns from the live set.
   * No-op if the entity is not live.
   */
  delete(entity: Entity): void;

  /**
   * (Re)initialize the live set from durable storage, discarding unsaved state
   */
  reload(): Promise<void>;

  /**
   * Number of live objects, optionally of one kind
   */
  count(kind?: EntityKind): number;

  /**
   * Release the file handle / connection
   */
  close(): Promise<void>;
}
