/**
 * Time Limit Rule
 *
 * Gives an observer a fixed amount of wall-clock time counted from its first
 * request. The expiry is fixed when the state is created and never moves.
 *
 * Slice: `{ "duration_seconds": 3600, "_state": { "first_used_at": …, "expires_at": …, "last_used_at": … } }`
 */

import { z } from 'zod';
import type { GeoObject, GeoObjectQuery, RuleConfig, RuleState } from '@mapwatch/shared';

import { coercedInteger, UnixSecondsSchema } from '../validation/schema-helpers.js';
import { AbstractStatefulObserverRule, type SliceSchema } from './observer-rule.js';

export const TIME_LIMIT_RULE_NAME = 'time_limit';

/**
 * Duration used when the configured one cannot be read
 */
export const DEFAULT_DURATION_SECONDS = 300;

const TimeLimitParametersSchema = z.object({
  duration_seconds: coercedInteger(1),
});

export type TimeLimitParameters = z.infer<typeof TimeLimitParametersSchema>;

const TimeLimitStateSchema = z
  .object({
    first_used_at: UnixSecondsSchema,
    expires_at: UnixSecondsSchema,
    last_used_at: UnixSecondsSchema.nullable().default(null),
  })
  .strict();

export type TimeLimitState = z.infer<typeof TimeLimitStateSchema>;

const TimeLimitConfigSchema = TimeLimitParametersSchema.extend({
  _state: TimeLimitStateSchema.optional(),
}).strict();

export class TimeLimitRule extends AbstractStatefulObserverRule<TimeLimitParameters, TimeLimitState> {
  protected readonly parametersSchema: SliceSchema<TimeLimitParameters> = TimeLimitParametersSchema;
  protected readonly stateSchema: SliceSchema<TimeLimitState> = TimeLimitStateSchema;

  getName(): string {
    return TIME_LIMIT_RULE_NAME;
  }

  override getPriority(): number {
    return 20;
  }

  getConfigSchema(): SliceSchema {
    return TimeLimitConfigSchema;
  }

  initializeState(config: RuleConfig): RuleState {
    const now = this.nowSeconds();
    const duration = this.readParameters(config)?.duration_seconds ?? DEFAULT_DURATION_SECONDS;

    const state: TimeLimitState = {
      first_used_at: now,
      expires_at: now + duration,
      last_used_at: null,
    };
    return state;
  }

  updateState(config: RuleConfig): RuleState {
    return { ...config.state, last_used_at: this.nowSeconds() };
  }

  override applyToQuery(query: GeoObjectQuery, config: RuleConfig): GeoObjectQuery {
    return this.isExpired(config) ? query.andWhere({ kind: 'never' }) : query;
  }

  override applyToObjects(objects: GeoObject[], config: RuleConfig): GeoObject[] {
    return this.isExpired(config) ? [] : objects;
  }

  /**
   * True once the clock has passed `expires_at`; no state yet means not expired
   */
  isExpired(config: RuleConfig): boolean {
    const state = this.readState(config);
    if (state === null) {
      return false;
    }
    return this.nowSeconds() > state.expires_at;
  }
}
