/**
 * Storage error types
 *
 * Every error carries a stable `code` so the HTTP layer can map it to a status
 * without matching on messages.
 */

import type { ZodIssue } from 'zod';

/**
 * Raised when an attribute value cannot be coerced to the type its entity declares,
 * or when a stored record cannot be rebuilt into an entity.
 */
export class EntityValidationError extends Error {
  code = 'ENTITY_INVALID' as const;
  readonly issues: ZodIssue[];

  constructor(kind: string, issues: ZodIssue[]) {
    const detail = issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    super(`Invalid ${kind} attributes: ${detail}`);
    this.name = 'EntityValidationError';
    this.issues = issues;
  }
}

/**
 * Raised when a relationship operation names an entity that is not live.
 */
export class EntityNotFoundError extends Error {
  code = 'ENTITY_NOT_FOUND' as const;
  readonly kind: string;
  readonly entityId: string;

  constructor(kind: string, entityId: string) {
    super(`${kind} not found: ${entityId}`);
    this.name = 'EntityNotFoundError';
    this.kind = kind;
    this.entityId = entityId;
  }
}

/**
 * Raised by the SQLITE backend when a flush violates a schema constraint
 * (dangling foreign key, duplicate key, NOT NULL).
 */
export class ConstraintViolationError extends Error {
  code = 'CONSTRAINT_VIOLATION' as const;
  readonly sqliteCode: string;

  constructor(message: string, sqliteCode: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConstraintViolationError';
    this.sqliteCode = sqliteCode;
  }
}
