/**
 * Observer Rule Contracts
 *
 * A rule is a named, prioritised unit of filtering logic. Every rule gets two
 * chances to narrow an observer's view: once while the storage query is
 * being built, and once over the objects that query returned. Rules are
 * immutable singletons; anything they need per observer arrives through the
 * RuleConfig argument.
 *
 * @tested tests/property/rule-variants.property.test.ts
 */

import type { z } from 'zod';
import type { GeoObject, GeoObjectQuery, RuleConfig, RuleState } from '@mapwatch/shared';

/**
 * Priority of a rule that does not declare one; lower runs earlier
 */
export const DEFAULT_RULE_PRIORITY = 100;

/**
 * Source of "now" for time-dependent rules
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * Converts a clock reading to integer Unix seconds
 */
export function toUnixSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

/**
 * Schema type accepted for a rule's slice; input is whatever the user wrote
 */
export type SliceSchema<T = unknown> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface ObserverRule {
  getName(): string;
  getPriority(): number;
  /** Schema of the rule's raw slice, `_state` included */
  getConfigSchema(): SliceSchema;
  /** May add predicates or bind parameters; returns the query to continue with */
  applyToQuery(query: GeoObjectQuery, config: RuleConfig): GeoObjectQuery;
  /** Runs on every evaluation; must be deterministic for the same config */
  applyToObjects(objects: GeoObject[], config: RuleConfig): GeoObject[];
}

/**
 * A rule whose decision depends on data kept between evaluations
 */
export interface StatefulObserverRule extends ObserverRule {
  /** Called once, when the slice carries no state yet */
  initializeState(config: RuleConfig): RuleState;
  /** Called on every evaluation with the current state; returns the state to persist */
  updateState(config: RuleConfig): RuleState;
}

export function isStatefulRule(rule: ObserverRule): rule is StatefulObserverRule {
  return (
    'initializeState' in rule &&
    typeof rule.initializeState === 'function' &&
    'updateState' in rule &&
    typeof rule.updateState === 'function'
  );
}

/**
 * Base class with no-op filtering and the default priority
 */
export abstract class AbstractObserverRule<P = unknown> implements ObserverRule {
  /** Schema used to read the parameters half of a RuleConfig */
  protected abstract readonly parametersSchema: SliceSchema<P>;

  abstract getName(): string;

  abstract getConfigSchema(): SliceSchema;

  getPriority(): number {
    return DEFAULT_RULE_PRIORITY;
  }

  applyToQuery(query: GeoObjectQuery, _config: RuleConfig): GeoObjectQuery {
    return query;
  }

  applyToObjects(objects: GeoObject[], _config: RuleConfig): GeoObject[] {
    return objects;
  }

  /**
   * Parses the parameters; null when they do not fit the schema
   */
  protected readParameters(config: RuleConfig): P | null {
    const result = this.parametersSchema.safeParse(config.parameters);
    return result.success ? result.data : null;
  }
}

/**
 * Base class for rules that keep runtime state in the slice's `_state` key
 */
export abstract class AbstractStatefulObserverRule<P, S extends RuleState>
  extends AbstractObserverRule<P>
  implements StatefulObserverRule
{
  protected abstract readonly stateSchema: SliceSchema<S>;

  constructor(protected readonly clock: Clock = systemClock) {
    super();
  }

  abstract initializeState(config: RuleConfig): RuleState;

  abstract updateState(config: RuleConfig): RuleState;

  protected readState(config: RuleConfig): S | null {
    if (config.state === undefined) {
      return null;
    }
    const result = this.stateSchema.safeParse(config.state);
    return result.success ? result.data : null;
  }

  protected nowSeconds(): number {
    return toUnixSeconds(this.clock());
  }
}
