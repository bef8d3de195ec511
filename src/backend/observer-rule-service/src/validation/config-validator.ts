/**
 * Rule Configuration Validator
 *
 * Checks a raw observer configuration in two passes: a structural pass over
 * the top-level keys, then a schema pass over the keys that survived it.
 * Every violation becomes one human-readable message; nothing here throws.
 *
 * Message format: `[<path>] <message>`, e.g. `[time_limit.duration_seconds] Must be at least 1`.
 *
 * @tested tests/property/config-validator.property.test.ts
 */

import type { z } from 'zod';
import { getLogger, isJsonObject, RULE_NAME_PATTERN, type Logger } from '@mapwatch/shared';

import type { SliceSchema } from '../rules/observer-rule.js';

export const ValidationMessages = {
  NOT_AN_OBJECT: 'Configuration must be a JSON object',
  EMPTY: 'Configuration cannot be empty',
  EMPTY_RULE_NAME: 'Rule name must be a non-empty string',
  invalidRuleName: (key: string) => `Invalid rule name format: ${key}`,
  unknownRule: (key: string) => `Unknown rule "${key}"`,
  unknownProperty: (key: string) => `Unknown property "${key}"`,
} as const;

export const ROOT_PATH = '(root)';

/**
 * Renders a zod issue path as `a.b[1]`
 */
export function formatPath(path: ReadonlyArray<string | number>): string {
  if (path.length === 0) {
    return ROOT_PATH;
  }

  return path
    .map((segment, index) => {
      if (typeof segment === 'number') {
        return `[${segment}]`;
      }
      return index === 0 ? segment : `.${segment}`;
    })
    .join('');
}

/**
 * One message per zod issue; unrecognised keys yield one message per key
 */
export function formatIssues(error: z.ZodError, prefix: ReadonlyArray<string | number> = []): string[] {
  const messages: string[] = [];

  for (const issue of error.issues) {
    const path = [...prefix, ...issue.path];

    if (issue.code === 'unrecognized_keys') {
      for (const key of issue.keys) {
        const message = path.length === 0 ? ValidationMessages.unknownRule(key) : ValidationMessages.unknownProperty(key);
        messages.push(`[${formatPath([...path, key])}] ${message}`);
      }
      continue;
    }

    messages.push(`[${formatPath(path)}] ${issue.message}`);
  }

  return messages;
}

export class RuleConfigValidator {
  constructor(private readonly logger: Logger = getLogger()) {}

  /**
   * Validates a whole raw configuration against an aggregate schema
   */
  validate(rawConfig: unknown, schema: SliceSchema): string[] {
    if (!isJsonObject(rawConfig)) {
      const errors = [ValidationMessages.NOT_AN_OBJECT];
      this.reportStructural(errors, rawConfig);
      return errors;
    }

    const keys = Object.keys(rawConfig);
    if (keys.length === 0) {
      const errors = [ValidationMessages.EMPTY];
      this.reportStructural(errors, rawConfig);
      return errors;
    }

    const structuralErrors: string[] = [];
    const validKeys: string[] = [];

    for (const key of keys) {
      if (key.length === 0) {
        structuralErrors.push(ValidationMessages.EMPTY_RULE_NAME);
      } else if (!RULE_NAME_PATTERN.test(key)) {
        structuralErrors.push(ValidationMessages.invalidRuleName(key));
      } else {
        validKeys.push(key);
      }
    }

    if (structuralErrors.length > 0) {
      this.reportStructural(structuralErrors, rawConfig);
    }

    if (validKeys.length === 0) {
      return structuralErrors;
    }

    const checked = Object.fromEntries(validKeys.map((key) => [key, rawConfig[key]]));
    const result = schema.safeParse(checked);
    if (result.success) {
      return structuralErrors;
    }

    const schemaErrors = formatIssues(result.error);
    this.logger.warn('Rule configuration failed schema validation', {
      errors: schemaErrors,
      configuration: checked,
    });

    return [...structuralErrors, ...schemaErrors];
  }

  /**
   * Validates one rule's raw slice against that rule's own schema
   */
  validateRule(ruleName: string, slice: unknown, schema: SliceSchema): string[] {
    const result = schema.safeParse(slice);
    if (result.success) {
      return [];
    }

    const errors = formatIssues(result.error, [ruleName]);
    this.logger.warn('Rule slice failed validation', {
      rule: ruleName,
      errors,
      configuration: slice,
    });
    return errors;
  }

  private reportStructural(errors: string[], rawConfig: unknown): void {
    this.logger.warn('Rule configuration failed structural validation', {
      errors,
      configuration: rawConfig,
    });
  }
}
