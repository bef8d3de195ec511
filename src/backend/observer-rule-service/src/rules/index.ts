/**
 * Built-in Observer Rules
 */

import { ObjectIdRule } from './object-id-rule.js';
import { RequestLimitRule } from './request-limit-rule.js';
import { SideIdRule } from './side-id-rule.js';
import { TimeLimitRule } from './time-limit-rule.js';
import { TimeRangeRule } from './time-range-rule.js';
import { systemClock, type Clock, type ObserverRule } from './observer-rule.js';

export * from './observer-rule.js';
export * from './id-list-rule.js';
export * from './object-id-rule.js';
export * from './side-id-rule.js';
export * from './time-range-rule.js';
export * from './time-limit-rule.js';
export * from './request-limit-rule.js';

/**
 * Instantiates every built-in rule; time-dependent rules share the clock
 */
export function createBuiltinRules(clock: Clock = systemClock): ObserverRule[] {
  return [
    new ObjectIdRule(),
    new SideIdRule(),
    new TimeRangeRule(clock),
    new TimeLimitRule(clock),
    new RequestLimitRule(clock),
  ];
}
