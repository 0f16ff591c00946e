import { z } from 'zod';
import { BaseModel, RestoredIdentity } from './base-model';

const cityAttributes = z.object({
  state_id: z.string(),
  name: z.string()
});

/**
 * City - belongs to a State, owns many places
 */
export class City extends BaseModel {
  readonly kind = 'City' as const;

  state_id = '';
  name = '';

  constructor(attributes: Record<string, unknown> = {}, restored?: RestoredIdentity) {
    super(restored);
    this.initialize(attributes, restored !== undefined);
  }

  protected get settable() {
    return cityAttributes;
  }

  protected attributeValues(): Record<string, unknown> {
    return { state_id: this.state_id, name: this.name };
  }
}
