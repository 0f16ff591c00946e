/**
 * Hearth Storage
 *
 * Entity model plus one ObjectStore contract with two backends:
 * - FileObjectStore: JSON snapshot of the whole live set
 * - SQLiteObjectStore: relational tables with cascading foreign keys
 */

export * from './models';
export * from './errors';
export * from './interfaces';
export * from './types';
export * from './relations';
export * from './factory';
export * from './backends/file';
export * from './backends/sqlite';
