/**
 * Rule Configuration Models
 *
 * An observer's rules arrive as one raw JSON object keyed by rule name. Each
 * raw slice mixes user-authored parameters with an engine-managed `_state`
 * sub-object. Inside the engine the two halves are kept apart as
 * {@link RuleConfig}, so only the engine ever writes state.
 */

import { z } from 'zod';

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * Reserved key holding a stateful rule's runtime data inside a raw slice
 */
export const RULE_STATE_KEY = '_state';

/**
 * Rule identifier pattern shared by the validator and the registry
 */
export const RULE_NAME_PATTERN = /^[A-Za-z][A-Za-z0-9_]*$/;

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

/**
 * Raw per-observer configuration: rule name -> raw slice
 */
export type RawRuleConfiguration = { [ruleName: string]: JsonValue };

/**
 * Opaque runtime state of a stateful rule
 */
export type RuleState = JsonObject;

/**
 * Typed view of one raw slice
 */
export interface RuleConfig {
  /** User-authored parameters: the slice without `_state`, or the list itself for list-shaped rules */
  readonly parameters: JsonValue;
  /** Engine-managed state, absent until the rule's first use */
  readonly state?: RuleState;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Splits a raw wire slice into parameters and state
 */
export function splitRuleConfig(slice: JsonValue): RuleConfig {
  if (!isJsonObject(slice) || !(RULE_STATE_KEY in slice)) {
    return { parameters: slice };
  }

  const { [RULE_STATE_KEY]: rawState, ...parameters } = slice;

  if (!isJsonObject(rawState)) {
    // A scalar `_state` is not state; leave it in place so schema checks report it.
    return { parameters: slice };
  }

  return { parameters, state: rawState };
}

/**
 * Rebuilds the raw wire slice from parameters and state
 */
export function joinRuleConfig(config: RuleConfig): JsonValue {
  if (config.state === undefined) {
    return config.parameters;
  }

  if (!isJsonObject(config.parameters)) {
    throw new TypeError('Rule state can only be attached to object-shaped parameters');
  }

  return { ...config.parameters, [RULE_STATE_KEY]: config.state };
}

/**
 * True when the configuration carries no rules at all
 */
export function isEmptyRuleConfiguration(rules: unknown): rules is null | undefined | Record<string, never> {
  if (rules === null || rules === undefined) {
    return true;
  }
  return isJsonObject(rules) && Object.keys(rules).length === 0;
}
