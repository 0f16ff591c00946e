import { z } from 'zod';
import { BaseModel, RestoredIdentity } from './base-model';

const count = z.coerce.number().int().min(0);
const coordinate = z.coerce.number().nullable();

const placeAttributes = z.object({
  city_id: z.string(),
  user_id: z.string(),
  name: z.string(),
  description: z.string().nullable(),
  number_rooms: count,
  number_bathrooms: count,
  max_guest: count,
  price_by_night: count,
  latitude: coordinate,
  longitude: coordinate
});

const amenityIdsSchema = z.array(z.string());

/**
 * Place - listed by a User in a City.
 *
 * The many-to-many link to Amenity lives here as an ordered, duplicate-free id
 * list. The FILE backend stores it inline; the SQLITE backend maps it onto the
 * place_amenity junction table.
 */
export class Place extends BaseModel {
  readonly kind = 'Place' as const;

  city_id = '';
  user_id = '';
  name = '';
  description: string | null = null;
  number_rooms = 0;
  number_bathrooms = 0;
  max_guest = 0;
  price_by_night = 0;
  latitude: number | null = null;
  longitude: number | null = null;

  private amenityIds: string[] = [];
  private linksChanged = false;

  constructor(attributes: Record<string, unknown> = {}, restored?: RestoredIdentity) {
    super(restored);
    this.initialize(attributes, restored !== undefined);
    if (restored) {
      const linked = amenityIdsSchema.safeParse(attributes.amenity_ids ?? []);
      this.amenityIds = linked.success ? [...new Set(linked.data)] : [];
    }
  }

  get amenity_ids(): readonly string[] {
    return this.amenityIds;
  }

  /**
   * True when the link set changed since the last save
   */
  get hasLinkChanges(): boolean {
    return this.linksChanged;
  }

  /**
   * @returns false if the amenity was already linked
   */
  linkAmenity(amenityId: string): boolean {
    if (this.amenityIds.includes(amenityId)) return false;
    this.amenityIds.push(amenityId);
    this.linksChanged = true;
    return true;
  }

  /**
   * @returns false if the amenity was not linked
   */
  unlinkAmenity(amenityId: string): boolean {
    const index = this.amenityIds.indexOf(amenityId);
    if (index === -1) return false;
    this.amenityIds.splice(index, 1);
    this.linksChanged = true;
    return true;
  }

  markPersisted(): void {
    super.markPersisted();
    this.linksChanged = false;
  }

  protected get settable() {
    return placeAttributes;
  }

  protected attributeValues(): Record<string, unknown> {
    return {
      city_id: this.city_id,
      user_id: this.user_id,
      name: this.name,
      description: this.description,
      number_rooms: this.number_rooms,
      number_bathrooms: this.number_bathrooms,
      max_guest: this.max_guest,
      price_by_night: this.price_by_night,
      latitude: this.latitude,
      longitude: this.longitude,
      amenity_ids: [...this.amenityIds]
    };
  }
}
