import * as crypto from 'crypto';
import { z } from 'zod';
import { BaseModel, RestoredIdentity } from './base-model';

const userAttributes = z.object({
  email: z.string(),
  password: z.string(),
  first_name: z.string().nullable(),
  last_name: z.string().nullable()
});

export function hashPassword(password: string): string {
  return crypto.createHash('sha256').update(password, 'utf-8').digest('hex');
}

/**
 * User - owns places and reviews.
 * The password is kept as a SHA-256 digest and never leaves through toDict().
 */
export class User extends BaseModel {
  readonly kind = 'User' as const;

  email = '';
  password = '';
  first_name: string | null = null;
  last_name: string | null = null;

  constructor(attributes: Record<string, unknown> = {}, restored?: RestoredIdentity) {
    super(restored);
    this.initialize(attributes, restored !== undefined);
  }

  checkPassword(candidate: string): boolean {
    return this.password === hashPassword(candidate);
  }

  protected get settable() {
    return userAttributes;
  }

  protected normalize(values: Record<string, unknown>): Record<string, unknown> {
    const { password } = values;
    return typeof password === 'string' ? { ...values, password: hashPassword(password) } : values;
  }

  protected hiddenKeys(): readonly string[] {
    return ['password'];
  }

  protected attributeValues(): Record<string, unknown> {
    return {
      email: this.email,
      password: this.password,
      first_name: this.first_name,
      last_name: this.last_name
    };
  }
}
