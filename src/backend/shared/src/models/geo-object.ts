/**
 * Geo Object and Observer Models
 *
 * Canonical shapes of the two records the rule engine reads. Both are owned
 * by the map CRUD layer; the engine never creates, deletes or mutates a
 * GeoObject, and only ever rewrites an observer's `rules` blob.
 *
 * @tested tests/property/shared-models.property.test.ts
 */

import { z } from 'zod';

import { JsonValueSchema } from './rule-config.js';

export const GeoObjectSchema = z.object({
  id: z.number().int().positive(),
  name: z.string().min(1).max(255),
  mapId: z.number().int().positive(),
  sideId: z.number().int().positive().nullable(),
  geometryType: z.enum(['point', 'polygon', 'circle', 'linestring']).default('point'),
  /** Lifetime in seconds; null or 0 means the object never expires */
  ttlSeconds: z.number().int().min(0).nullable(),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date().nullable(),
});

export type GeoObject = z.infer<typeof GeoObjectSchema>;

/**
 * Checks whether an object is still live at the given instant
 *
 * @edgecase An object refreshed after creation lives for ttl seconds from its last update
 */
export function isGeoObjectActive(object: GeoObject, now: Date = new Date()): boolean {
  if (object.ttlSeconds === null || object.ttlSeconds === 0) {
    return true;
  }

  const ttlMs = object.ttlSeconds * 1000;
  if (object.createdAt.getTime() + ttlMs > now.getTime()) {
    return true;
  }

  return object.updatedAt !== null && object.updatedAt.getTime() + ttlMs > now.getTime();
}

export const ObserverSchema = z.object({
  id: z.number().int().positive(),
  name: z.string().min(1).max(255),
  mapId: z.number().int().positive(),
  /** User-editable rules blob; validated by the engine, not here */
  rules: JsonValueSchema.nullable().default(null),
  /** Incremented on every stored rules write */
  version: z.number().int().min(0).default(0),
});

export type Observer = z.infer<typeof ObserverSchema>;

export function validateGeoObject(data: unknown): GeoObject {
  return GeoObjectSchema.parse(data);
}

export function safeValidateGeoObject(data: unknown): z.SafeParseReturnType<unknown, GeoObject> {
  return GeoObjectSchema.safeParse(data);
}

export function validateObserver(data: unknown): Observer {
  return ObserverSchema.parse(data);
}

export function safeValidateObserver(data: unknown): z.SafeParseReturnType<unknown, Observer> {
  return ObserverSchema.safeParse(data);
}
