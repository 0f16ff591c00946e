import { FastifyReply } from 'fastify';
import { Entity, ObjectStore } from 'hearth-storage';

export type JsonObject = Record<string, unknown>;

/**
 * Keys a PUT never applies, whatever the type
 */
export const PROTECTED_KEYS = ['id', 'created_at', 'updated_at', '__class__'] as const;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * The request body when it is a non-empty JSON object, else null
 */
export function readJsonObject(body: unknown): JsonObject | null {
  if (!isJsonObject(body) || Object.keys(body).length === 0) return null;
  return body;
}

/**
 * First required field that is absent or empty
 */
export function missingField(body: JsonObject, fields: readonly string[]): string | undefined {
  return fields.find(field => !body[field]);
}

export function without(body: JsonObject, keys: readonly string[]): JsonObject {
  const kept: JsonObject = {};
  for (const [key, value] of Object.entries(body)) {
    if (!keys.includes(key)) kept[key] = value;
  }
  return kept;
}

export function notFound(reply: FastifyReply): FastifyReply {
  return reply.code(404).send({ error: 'Not found' });
}

export function badRequest(reply: FastifyReply, error: string): FastifyReply {
  return reply.code(400).send({ error });
}

/**
 * Add and save a new entity; on a failed save it is dropped again so the
 * next save does not retry it.
 */
export async function persistNew(store: ObjectStore, entity: Entity): Promise<void> {
  store.add(entity);
  try {
    await store.save();
  } catch (error) {
    store.delete(entity);
    throw error;
  }
}

/**
 * Delete an entity (and what it owns) and save
 */
export async function persistDelete(store: ObjectStore, entity: Entity): Promise<Record<string, never>> {
  store.delete(entity);
  await store.save();
  return {};
}
