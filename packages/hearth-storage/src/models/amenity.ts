import { z } from 'zod';
import { BaseModel, RestoredIdentity } from './base-model';

const amenityAttributes = z.object({
  name: z.string()
});

export class Amenity extends BaseModel {
  readonly kind = 'Amenity' as const;

  name = '';

  constructor(attributes: Record<string, unknown> = {}, restored?: RestoredIdentity) {
    super(restored);
    this.initialize(attributes, restored !== undefined);
  }

  protected get settable() {
    return amenityAttributes;
  }

  protected attributeValues(): Record<string, unknown> {
    return { name: this.name };
  }
}
