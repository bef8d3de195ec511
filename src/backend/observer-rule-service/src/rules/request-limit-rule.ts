/**
 * Request Limit Rule
 *
 * Gives an observer a fixed number of requests. Each evaluation spends one;
 * the evaluation that spends the last one is still served.
 *
 * Slice: `{ "limit": 100, "_state": { "remaining": 99, "initialized_at": …, "last_used_at": … } }`
 *
 * @tested tests/integration/observer-rule-engine.integration.test.ts
 */

import { z } from 'zod';
import type { GeoObject, GeoObjectQuery, RuleConfig, RuleState } from '@mapwatch/shared';

import { coercedInteger, UnixSecondsSchema } from '../validation/schema-helpers.js';
import { AbstractStatefulObserverRule, type SliceSchema } from './observer-rule.js';

export const REQUEST_LIMIT_RULE_NAME = 'request_limit';

/**
 * Limit used when the configured one cannot be read
 */
export const DEFAULT_REQUEST_LIMIT = 10;

const RequestLimitParametersSchema = z.object({
  limit: coercedInteger(1),
});

export type RequestLimitParameters = z.infer<typeof RequestLimitParametersSchema>;

const RequestLimitStateSchema = z
  .object({
    remaining: z.number().int().min(0),
    initialized_at: UnixSecondsSchema,
    last_used_at: UnixSecondsSchema.nullable().default(null),
  })
  .strict();

export type RequestLimitState = z.infer<typeof RequestLimitStateSchema>;

const RequestLimitConfigSchema = RequestLimitParametersSchema.extend({
  _state: RequestLimitStateSchema.optional(),
}).strict();

export class RequestLimitRule extends AbstractStatefulObserverRule<RequestLimitParameters, RequestLimitState> {
  protected readonly parametersSchema: SliceSchema<RequestLimitParameters> = RequestLimitParametersSchema;
  protected readonly stateSchema: SliceSchema<RequestLimitState> = RequestLimitStateSchema;

  getName(): string {
    return REQUEST_LIMIT_RULE_NAME;
  }

  override getPriority(): number {
    return 30;
  }

  getConfigSchema(): SliceSchema {
    return RequestLimitConfigSchema;
  }

  initializeState(config: RuleConfig): RuleState {
    const state: RequestLimitState = {
      remaining: this.readParameters(config)?.limit ?? DEFAULT_REQUEST_LIMIT,
      initialized_at: this.nowSeconds(),
      last_used_at: null,
    };
    return state;
  }

  updateState(config: RuleConfig): RuleState {
    const remaining = this.readState(config)?.remaining ?? 0;
    return {
      ...config.state,
      remaining: Math.max(0, remaining - 1),
      last_used_at: this.nowSeconds(),
    };
  }

  override applyToQuery(query: GeoObjectQuery, config: RuleConfig): GeoObjectQuery {
    return this.isExhausted(config) ? query.andWhere({ kind: 'never' }) : query;
  }

  override applyToObjects(objects: GeoObject[], config: RuleConfig): GeoObject[] {
    return this.isExhausted(config) ? [] : objects;
  }

  /**
   * Decides on the state as it was before this evaluation spent its request
   */
  isExhausted(config: RuleConfig): boolean {
    const state = this.readState(config);
    return state === null || state.remaining <= 0;
  }
}
