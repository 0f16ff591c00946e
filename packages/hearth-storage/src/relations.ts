/**
 * Relationship resolution
 *
 * Relationships are stored as id attributes only. Collections ("cities of a
 * state") and back-references ("state of a city") are looked up through the
 * ObjectStore when asked for, so no entity owns another.
 */

import { EntityNotFoundError } from './errors';
import type { ForeignKey, ObjectStore } from './interfaces';
import {
  Amenity,
  City,
  Entity,
  EntityKind,
  ObjectKey,
  Place,
  Review,
  State,
  User,
  keyOf
} from './models';

export interface OwnershipRule {
  parent: EntityKind;
  child: EntityKind;
  foreignKey: ForeignKey;
}

/**
 * Parent → child ownership. Deleting a parent deletes its children, transitively.
 */
export const OWNERSHIP: readonly OwnershipRule[] = [
  { parent: 'State', child: 'City', foreignKey: 'state_id' },
  { parent: 'City', child: 'Place', foreignKey: 'city_id' },
  { parent: 'User', child: 'Place', foreignKey: 'user_id' },
  { parent: 'User', child: 'Review', foreignKey: 'user_id' },
  { parent: 'Place', child: 'Review', foreignKey: 'place_id' }
];

/**
 * Value of an owning attribute, or undefined if the entity has none by that name
 */
export function foreignKeyValue(entity: Entity, foreignKey: ForeignKey): string | undefined {
  const value = entity.toRecord()[foreignKey];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Everything owned by root, directly or transitively (root excluded).
 *
 * @param findChildren returns the live children of a kind pointing at a parent id
 */
export function collectDependents(
  root: Entity,
  findChildren: (child: EntityKind, foreignKey: ForeignKey, parentId: string) => Entity[]
): Entity[] {
  const seen = new Set<ObjectKey>([keyOf(root)]);
  const dependents: Entity[] = [];
  const queue: Entity[] = [root];

  while (queue.length > 0) {
    const parent = queue.shift();
    if (!parent) break;

    for (const rule of OWNERSHIP) {
      if (rule.parent !== parent.kind) continue;
      for (const child of findChildren(rule.child, rule.foreignKey, parent.id)) {
        const key = keyOf(child);
        if (seen.has(key)) continue;
        seen.add(key);
        dependents.push(child);
        queue.push(child);
      }
    }
  }

  return dependents;
}

/**
 * RelationshipResolver - derived collections and back-references over an ObjectStore
 */
export class RelationshipResolver {
  constructor(private readonly store: ObjectStore) {}

  citiesOf(state: State): City[] {
    return this.store.filterBy('City', 'state_id', state.id);
  }

  stateOf(city: City): State | null {
    return this.store.get('State', city.state_id);
  }

  placesOf(city: City): Place[] {
    return this.store.filterBy('Place', 'city_id', city.id);
  }

  cityOf(place: Place): City | null {
    return this.store.get('City', place.city_id);
  }

  ownerOf(place: Place): User | null {
    return this.store.get('User', place.user_id);
  }

  placesOwnedBy(user: User): Place[] {
    return this.store.filterBy('Place', 'user_id', user.id);
  }

  reviewsOf(place: Place): Review[] {
    return this.store.filterBy('Review', 'place_id', place.id);
  }

  reviewsBy(user: User): Review[] {
    return this.store.filterBy('Review', 'user_id', user.id);
  }

  placeOf(review: Review): Place | null {
    return this.store.get('Place', review.place_id);
  }

  authorOf(review: Review): User | null {
    return this.store.get('User', review.user_id);
  }

  /**
   * Linked amenities that are still live, in link order
   */
  amenitiesOf(place: Place): Amenity[] {
    const amenities: Amenity[] = [];
    for (const amenityId of place.amenity_ids) {
      const amenity = this.store.get('Amenity', amenityId);
      if (amenity) amenities.push(amenity);
    }
    return amenities;
  }

  /**
   * Live places linked to an amenity
   */
  placesWith(amenity: Amenity): Place[] {
    return [...this.store.all('Place').values()].filter(place => place.amenity_ids.includes(amenity.id));
  }

  /**
   * Link an amenity to a place. Both must be live.
   *
   * @returns false if the pair was already linked
   * @throws EntityNotFoundError if either end is not live
   */
  linkAmenity(place: Place, amenity: Amenity): boolean {
    this.requireLive(place);
    this.requireLive(amenity);
    return place.linkAmenity(amenity.id);
  }

  /**
   * @returns false if the pair was not linked
   */
  unlinkAmenity(place: Place, amenity: Amenity): boolean {
    return place.unlinkAmenity(amenity.id);
  }

  private requireLive(entity: Entity): void {
    if (!this.store.get(entity.kind, entity.id)) {
      throw new EntityNotFoundError(entity.kind, entity.id);
    }
  }
}
