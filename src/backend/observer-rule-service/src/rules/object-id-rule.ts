/**
 * Object Id Rule
 *
 * Restricts an observer to a hand-picked set of objects.
 * Slice: `[12, 40, 41]`
 */

import { IdListRule } from './id-list-rule.js';

export const OBJECT_ID_RULE_NAME = 'object_id';

export const MAX_OBJECT_IDS = 100;

export class ObjectIdRule extends IdListRule {
  constructor() {
    super(MAX_OBJECT_IDS, 'idIn', 'allowedObjectIds');
  }

  getName(): string {
    return OBJECT_ID_RULE_NAME;
  }

  // Narrow id filters run before the broader side filter
  override getPriority(): number {
    return 50;
  }
}
