/**
 * Entity registry: kind name ↔ class, and rebuilding entities from stored records.
 */

import { EntityValidationError } from '../errors';
import { Amenity } from './amenity';
import { EntityKind, RestoredIdentity, entityRecordSchema } from './base-model';
import { City } from './city';
import { Place } from './place';
import { Review } from './review';
import { State } from './state';
import { User } from './user';

export * from './base-model';
export { State, City, Amenity, User, Place, Review };
export { hashPassword } from './user';

export interface EntityTypes {
  State: State;
  City: City;
  Amenity: Amenity;
  User: User;
  Place: Place;
  Review: Review;
}

export type EntityOf<K extends EntityKind> = EntityTypes[K];

export type Entity = EntityTypes[EntityKind];

type EntityConstructor<T> = new (attributes?: Record<string, unknown>, restored?: RestoredIdentity) => T;

export const MODELS: { [K in EntityKind]: EntityConstructor<EntityTypes[K]> } = {
  State,
  City,
  Amenity,
  User,
  Place,
  Review
};

/**
 * Narrow an entity to a kind. Without a kind every entity matches.
 */
export function isEntityOf<K extends EntityKind>(entity: Entity, kind?: K): entity is EntityOf<K> {
  return kind === undefined || entity.kind === kind;
}

/**
 * Create a fresh entity of the given kind from caller-supplied attributes.
 */
export function createEntity<K extends EntityKind>(kind: K, attributes: Record<string, unknown> = {}): EntityOf<K> {
  return construct(kind, attributes);
}

function construct<K extends EntityKind>(
  kind: K,
  attributes: Record<string, unknown>,
  restored?: RestoredIdentity
): EntityOf<K> {
  const Model: EntityConstructor<EntityOf<K>> = MODELS[kind];
  return new Model(attributes, restored);
}

/**
 * Rebuild an entity from a storage record (snapshot entry or table row).
 * Identity and timestamps come from the record; attributes are coerced, not normalized.
 *
 * @throws EntityValidationError if the record is malformed or names an unknown kind
 */
export function hydrate(raw: unknown): Entity {
  const parsed = entityRecordSchema.safeParse(raw);
  if (!parsed.success) {
    throw new EntityValidationError('record', parsed.error.issues);
  }

  const record = parsed.data;
  const restored: RestoredIdentity = {
    id: record.id,
    created_at: new Date(record.created_at),
    updated_at: new Date(record.updated_at)
  };
  return construct(record.__class__, record, restored);
}

/**
 * Composite live-set key: "<Kind>.<id>"
 */
export type ObjectKey = `${EntityKind}.${string}`;

export function objectKey(kind: EntityKind, id: string): ObjectKey {
  return `${kind}.${id}`;
}

export function keyOf(entity: Entity): ObjectKey {
  return objectKey(entity.kind, entity.id);
}
