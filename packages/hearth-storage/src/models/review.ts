import { z } from 'zod';
import { BaseModel, RestoredIdentity } from './base-model';

const reviewAttributes = z.object({
  place_id: z.string(),
  user_id: z.string(),
  text: z.string()
});

/**
 * Review - written by a User about a Place
 */
export class Review extends BaseModel {
  readonly kind = 'Review' as const;

  place_id = '';
  user_id = '';
  text = '';

  constructor(attributes: Record<string, unknown> = {}, restored?: RestoredIdentity) {
    super(restored);
    this.initialize(attributes, restored !== undefined);
  }

  protected get settable() {
    return reviewAttributes;
  }

  protected attributeValues(): Record<string, unknown> {
    return { place_id: this.place_id, user_id: this.user_id, text: this.text };
  }
}
