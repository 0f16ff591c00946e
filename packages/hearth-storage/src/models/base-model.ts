/**
 * BaseModel - identity, timestamps, serialization and update semantics shared
 * by every entity type.
 *
 * Entities never hold pointers to their parents or children; relationships are
 * plain id attributes resolved through an ObjectStore (see relations.ts).
 */

import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { EntityValidationError } from '../errors';

export const ENTITY_KINDS = ['State', 'City', 'Amenity', 'User', 'Place', 'Review'] as const;

export type EntityKind = (typeof ENTITY_KINDS)[number];

const KIND_NAMES: ReadonlySet<string> = new Set(ENTITY_KINDS);

export function isEntityKind(value: string): value is EntityKind {
  return KIND_NAMES.has(value);
}

/**
 * Identity of an entity rebuilt from storage
 */
export interface RestoredIdentity {
  id: string;
  created_at: Date;
  updated_at: Date;
}

/**
 * Storage/transport mapping of an entity
 */
export interface EntityRecord {
  __class__: EntityKind;
  id: string;
  created_at: string;
  updated_at: string;
  [attribute: string]: unknown;
}

// Never settable through update(), whatever the entity declares
const RESERVED_KEYS = new Set(['id', 'created_at', 'updated_at', '__class__']);

export abstract class BaseModel {
  abstract readonly kind: EntityKind;

  readonly id: string;
  readonly created_at: Date;
  updated_at: Date;

  private persisted: boolean;
  private dirty: boolean;
  private staged: Date | null = null;

  protected constructor(restored?: RestoredIdentity) {
    if (restored) {
      this.id = restored.id;
      this.created_at = restored.created_at;
      this.updated_at = restored.updated_at;
      this.persisted = true;
      this.dirty = false;
    } else {
      const now = new Date();
      this.id = uuidv4();
      this.created_at = now;
      this.updated_at = new Date(now.getTime());
      this.persisted = false;
      this.dirty = true;
    }
  }

  /**
   * zod schema of the attributes a caller may set on this type
   */
  protected abstract get settable(): z.AnyZodObject;

  /**
   * Current values of the settable attributes, in declaration order
   */
  protected abstract attributeValues(): Record<string, unknown>;

  /**
   * Transform applied to caller-supplied values before they are assigned.
   * Not applied when rebuilding from storage.
   */
  protected normalize(values: Record<string, unknown>): Record<string, unknown> {
    return values;
  }

  /**
   * Assign attributes. Subclass constructors call this once their own fields exist.
   */
  protected initialize(attributes: Record<string, unknown>, restored: boolean): void {
    const values = this.coerce(attributes);
    Object.assign(this, restored ? values : this.normalize(values));
  }

  /**
   * Apply a partial attribute mapping. Reserved and unknown keys are ignored.
   *
   * @returns the attribute names that were applied
   * @throws EntityValidationError if a value cannot be coerced
   */
  update(changes: Record<string, unknown>): string[] {
    const values = this.normalize(this.coerce(changes));
    Object.assign(this, values);
    this.dirty = true;
    return Object.keys(values);
  }

  get isNew(): boolean {
    return !this.persisted;
  }

  get isDirty(): boolean {
    return this.dirty;
  }

  /**
   * Storage mapping a backend writes on save. A stored entity with pending
   * changes carries its next updated_at here; the entity itself keeps the old
   * value until markPersisted() confirms the write.
   */
  recordForSave(): EntityRecord {
    this.staged = this.dirty && this.persisted ? this.nextStamp() : null;
    const record = this.toRecord();
    if (this.staged) {
      record.updated_at = this.staged.toISOString();
    }
    return record;
  }

  /**
   * Called by a backend once this entity's state is durable.
   */
  markPersisted(): void {
    if (this.staged) {
      this.updated_at = this.staged;
      this.staged = null;
    }
    this.persisted = true;
    this.dirty = false;
  }

  /**
   * Storage mapping: every attribute, timestamps as ISO strings.
   */
  toRecord(): EntityRecord {
    return {
      __class__: this.kind,
      id: this.id,
      created_at: this.created_at.toISOString(),
      updated_at: this.updated_at.toISOString(),
      ...this.attributeValues()
    };
  }

  /**
   * Transport mapping: the storage mapping minus hidden attributes.
   */
  toDict(): EntityRecord {
    const record = this.toRecord();
    for (const key of this.hiddenKeys()) {
      delete record[key];
    }
    return record;
  }

  protected hiddenKeys(): readonly string[] {
    return [];
  }

  private nextStamp(): Date {
    const now = Date.now();
    const previous = this.updated_at.getTime();
    return new Date(now > previous ? now : previous + 1);
  }

  private coerce(input: Record<string, unknown>): Record<string, unknown> {
    const shape = this.settable.shape;
    const picked: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(input)) {
      if (RESERVED_KEYS.has(key) || !(key in shape) || value === undefined) continue;
      picked[key] = value;
    }

    const result = this.settable.partial().safeParse(picked);
    if (!result.success) {
      throw new EntityValidationError(this.kind, result.error.issues);
    }
    return result.data;
  }
}

/**
 * Validation of the identity part of a stored record
 */
export const entityRecordSchema = z
  .object({
    __class__: z.enum(ENTITY_KINDS),
    id: z.string().min(1),
    created_at: z.string().refine(value => !Number.isNaN(Date.parse(value)), 'Invalid timestamp'),
    updated_at: z.string().refine(value => !Number.isNaN(Date.parse(value)), 'Invalid timestamp')
  })
  .passthrough();
