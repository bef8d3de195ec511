/**
 * Id List Rules
 *
 * Shared behaviour of the allow-list rules whose slice is a bare list of ids
 * rather than an object. Only the query phase filters; the list is turned
 * into an `IN (:param)` predicate on the storage side.
 */

import type { GeoObjectQuery, JsonValue, QueryPredicate, RuleConfig } from '@mapwatch/shared';

import { idListSchema } from '../validation/schema-helpers.js';
import { AbstractObserverRule, type SliceSchema } from './observer-rule.js';

/**
 * Keeps the entries that denote a positive id, truncated and in first-seen order
 *
 * @edgecase Numeric strings count as ids; "abc", 0, -3 and nested values are dropped
 */
export function sanitizeIds(parameters: JsonValue): number[] {
  if (!Array.isArray(parameters)) {
    return [];
  }

  const ids = new Set<number>();
  for (const entry of parameters) {
    const value = typeof entry === 'string' && entry.trim() !== '' ? Number(entry) : entry;
    if (typeof value === 'number' && Number.isFinite(value) && value > 0) {
      const id = Math.trunc(value);
      if (id > 0) {
        ids.add(id);
      }
    }
  }
  return [...ids];
}

export abstract class IdListRule extends AbstractObserverRule<number[]> {
  protected readonly parametersSchema: SliceSchema<number[]>;

  protected constructor(
    maxItems: number,
    private readonly predicateKind: 'idIn' | 'sideIdIn',
    private readonly parameterName: string
  ) {
    super();
    this.parametersSchema = idListSchema(maxItems);
  }

  getConfigSchema(): SliceSchema {
    return this.parametersSchema;
  }

  override applyToQuery(query: GeoObjectQuery, config: RuleConfig): GeoObjectQuery {
    const ids = sanitizeIds(config.parameters);
    if (ids.length === 0) {
      return query;
    }

    const predicate: QueryPredicate = { kind: this.predicateKind, param: this.parameterName };
    return query.andWhere(predicate).setParameter(this.parameterName, ids);
  }
}
