/**
 * Time Range Rule
 *
 * Opens an observer's view only during a daily window, evaluated in one of
 * a fixed set of time zones. A window whose end is not after its start runs
 * across midnight (22:00 -> 06:00).
 *
 * Slice: `{ "start_time": "09:00", "end_time": "17:30", "timezone": "Europe/Paris" }`
 *
 * @tested tests/property/rule-variants.property.test.ts
 */

import { z } from 'zod';
import type { GeoObject, GeoObjectQuery, RuleConfig } from '@mapwatch/shared';

import { TimeOfDaySchema } from '../validation/schema-helpers.js';
import { AbstractObserverRule, systemClock, type Clock, type SliceSchema } from './observer-rule.js';

export const TIME_RANGE_RULE_NAME = 'time_range';

export const SUPPORTED_TIMEZONES = [
  'UTC',
  'Europe/London',
  'Europe/Paris',
  'Europe/Berlin',
  'Europe/Moscow',
  'America/New_York',
  'America/Los_Angeles',
  'Asia/Tokyo',
  'Asia/Shanghai',
] as const;

export type SupportedTimezone = (typeof SUPPORTED_TIMEZONES)[number];

export const DEFAULT_TIMEZONE: SupportedTimezone = 'UTC';

const TimezoneSchema = z.enum(SUPPORTED_TIMEZONES, {
  errorMap: () => ({ message: `Must be one of: ${SUPPORTED_TIMEZONES.join(', ')}` }),
});

const TimeRangeParametersSchema = z.object({
  start_time: TimeOfDaySchema,
  end_time: TimeOfDaySchema,
  timezone: TimezoneSchema.optional(),
});

export type TimeRangeParameters = z.infer<typeof TimeRangeParametersSchema>;

const TimeRangeConfigSchema = TimeRangeParametersSchema.strict();

/**
 * Seconds since local midnight of `instant` in `timezone`
 */
export function secondsOfDayIn(instant: Date, timezone: string): number {
  const parts = new Intl.DateTimeFormat('en-GB', {
    timeZone: timezone,
    hourCycle: 'h23',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
  }).formatToParts(instant);

  const read = (type: Intl.DateTimeFormatPartTypes): number => {
    const part = parts.find((candidate) => candidate.type === type);
    if (part === undefined) {
      throw new RangeError(`Missing ${type} when formatting time in ${timezone}`);
    }
    return Number(part.value);
  };

  return read('hour') * 3600 + read('minute') * 60 + read('second');
}

/**
 * Parses HH:MM into seconds since midnight
 */
export function parseTimeOfDay(value: string): number {
  const match = /^(\d{2}):(\d{2})$/.exec(value);
  if (match === null) {
    throw new RangeError(`Invalid time format: ${value}`);
  }

  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) {
    throw new RangeError(`Invalid time values: ${value}`);
  }

  return hours * 3600 + minutes * 60;
}

/**
 * Whether `now` (seconds of day) falls in the closed window [start, end]
 */
export function isWithinWindow(now: number, start: number, end: number): boolean {
  if (end <= start) {
    return now >= start || now <= end;
  }
  return now >= start && now <= end;
}

export class TimeRangeRule extends AbstractObserverRule<TimeRangeParameters> {
  protected readonly parametersSchema: SliceSchema<TimeRangeParameters> = TimeRangeParametersSchema;

  constructor(private readonly clock: Clock = systemClock) {
    super();
  }

  getName(): string {
    return TIME_RANGE_RULE_NAME;
  }

  override getPriority(): number {
    return 10;
  }

  getConfigSchema(): SliceSchema {
    return TimeRangeConfigSchema;
  }

  override applyToQuery(query: GeoObjectQuery, config: RuleConfig): GeoObjectQuery {
    return this.isOpen(config) ? query : query.andWhere({ kind: 'never' });
  }

  override applyToObjects(objects: GeoObject[], config: RuleConfig): GeoObject[] {
    return this.isOpen(config) ? objects : [];
  }

  /**
   * Whether the window is open now; a configuration that cannot be read leaves it open
   */
  isOpen(config: RuleConfig): boolean {
    const parameters = this.readParameters(config);
    if (parameters === null) {
      return true;
    }

    try {
      const now = secondsOfDayIn(this.clock(), parameters.timezone ?? DEFAULT_TIMEZONE);
      return isWithinWindow(now, parseTimeOfDay(parameters.start_time), parseTimeOfDay(parameters.end_time));
    } catch {
      return true;
    }
  }
}
