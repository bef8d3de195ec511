/**
 * Side Id Rule
 *
 * Restricts an observer to the objects of the given sides. Objects without a
 * side never match.
 */

import { IdListRule } from './id-list-rule.js';

export const SIDE_ID_RULE_NAME = 'side_id';

export const MAX_SIDE_IDS = 50;

export class SideIdRule extends IdListRule {
  constructor() {
    super(MAX_SIDE_IDS, 'sideIdIn', 'allowedSideIds');
  }

  getName(): string {
    return SIDE_ID_RULE_NAME;
  }

  override getPriority(): number {
    return 75;
  }
}
