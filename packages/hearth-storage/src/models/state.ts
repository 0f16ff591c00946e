import { z } from 'zod';
import { BaseModel, RestoredIdentity } from './base-model';

const stateAttributes = z.object({
  name: z.string()
});

/**
 * State - owns many cities
 */
export class State extends BaseModel {
  readonly kind = 'State' as const;

  name = '';

  constructor(attributes: Record<string, unknown> = {}, restored?: RestoredIdentity) {
    super(restored);
    this.initialize(attributes, restored !== undefined);
  }

  protected get settable() {
    return stateAttributes;
  }

  protected attributeValues(): Record<string, unknown> {
    return { name: this.name };
  }
}
