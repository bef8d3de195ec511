/**
 * Property 2: Configuration Validation Reporting
 *
 * For any raw configuration, validation SHALL never throw and SHALL report
 * one message per violation: structural problems with the top-level keys
 * first, then every schema violation prefixed with its property path.
 *
 * @file src/backend/observer-rule-service/src/validation/config-validator.ts
 * @file src/backend/observer-rule-service/src/validation/schema-helpers.ts
 */

import fc from 'fast-check';
import { beforeEach, describe, expect, it } from 'vitest';
import { z } from 'zod';

import { InMemoryLogSink, Logger, LogLevel } from '../../src/backend/shared/src/index.js';
import {
  RuleConfigValidator,
  coerceNumericString,
  createDefaultRuleRegistry,
  formatIssues,
  formatPath,
  type RuleRegistry,
} from '../../src/backend/observer-rule-service/src/index.js';

// Property test configuration
const propertyConfig = {
  numRuns: 100,
  verbose: false,
};

const TIMEZONE_MESSAGE =
  'Must be one of: UTC, Europe/London, Europe/Paris, Europe/Berlin, Europe/Moscow, America/New_York, America/Los_Angeles, Asia/Tokyo, Asia/Shanghai';

describe('Property 2: Configuration Validation Reporting', () => {
  let sink: InMemoryLogSink;
  let validator: RuleConfigValidator;
  let registry: RuleRegistry;

  beforeEach(() => {
    sink = new InMemoryLogSink();
    const logger = new Logger({ serviceName: 'validator-test', minLevel: LogLevel.DEBUG, sinks: [sink] });
    validator = new RuleConfigValidator(logger);
    registry = createDefaultRuleRegistry({ logger, validator });
    sink.clear();
  });

  const validate = (raw: unknown) => validator.validate(raw, registry.getAggregateSchema());

  describe('Structural pass', () => {
    it('should reject anything that is not a JSON object', () => {
      expect(validate([1, 2])).toEqual(['Configuration must be a JSON object']);
      expect(validate(null)).toEqual(['Configuration must be a JSON object']);
      expect(validate('object_id')).toEqual(['Configuration must be a JSON object']);
    });

    it('should reject an empty configuration', () => {
      expect(validate({})).toEqual(['Configuration cannot be empty']);
    });

    it('should report each malformed key exactly once', () => {
      expect(validate({ '1bad': [1], 'bad-name': [2] })).toEqual([
        'Invalid rule name format: 1bad',
        'Invalid rule name format: bad-name',
      ]);
      expect(validate({ '': [1] })).toEqual(['Rule name must be a non-empty string']);
    });

    it('should produce one message per malformed key for any set of such keys', () => {
      fc.assert(
        fc.property(
          fc.uniqueArray(fc.stringOf(fc.constantFrom(...'0123456789'.split('')), { minLength: 1, maxLength: 4 }), {
            minLength: 1,
            maxLength: 10,
          }),
          (prefixes) => {
            const keys = prefixes.map((prefix) => `${prefix}x`);
            const raw = Object.fromEntries(keys.map((key) => [key, [1]]));

            expect(validate(raw)).toEqual(keys.map((key) => `Invalid rule name format: ${key}`));
          }
        ),
        propertyConfig
      );
    });

    it('should log one warning with the violating configuration', () => {
      validate({ 'bad-name': [2] });

      const warnings = sink.byLevel(LogLevel.WARN);
      expect(warnings).toHaveLength(1);
      expect(warnings[0]?.message).toBe('Rule configuration failed structural validation');
      expect(warnings[0]?.metadata).toEqual({
        errors: ['Invalid rule name format: bad-name'],
        configuration: { 'bad-name': [2] },
      });
    });
  });

  describe('Schema pass', () => {
    it('should accept a valid configuration', () => {
      expect(
        validate({
          object_id: [1, 2, 3],
          time_range: { start_time: '22:00', end_time: '06:00', timezone: 'Europe/Berlin' },
          request_limit: { limit: 5, _state: { remaining: 4, initialized_at: 1714564800, last_used_at: null } },
        })
      ).toEqual([]);
      expect(sink.entries).toEqual([]);
    });

    it('should coerce numeric strings to integers', () => {
      expect(validate({ request_limit: { limit: '5' }, side_id: ['3', '4'] })).toEqual([]);
      expect(coerceNumericString(' 42 ')).toBe(42);
      expect(coerceNumericString('4x')).toBe('4x');
    });

    it('should prefix every violation with its property path', () => {
      expect(validate({ object_id: [], time_limit: { duration_seconds: 0 } })).toEqual([
        '[time_limit.duration_seconds] Must be at least 1',
        '[object_id] Must contain at least 1 id',
      ]);
      expect(validate({ object_id: [1, 'x'] })).toEqual(['[object_id[1]] Must be an integer']);
      expect(validate({ time_limit: {} })).toEqual(['[time_limit.duration_seconds] Required']);
    });

    it('should report time fields and unsupported zones', () => {
      expect(validate({ time_range: { start_time: '25:00', end_time: '06:00', timezone: 'Mars/Base' } })).toEqual([
        '[time_range.start_time] Must be a time in HH:MM format',
        `[time_range.timezone] ${TIMEZONE_MESSAGE}`,
      ]);
    });

    it('should report each unknown rule and each unknown property separately', () => {
      expect(validate({ object_id: [1], colour_filter: { a: 1 }, zone: 1 })).toEqual([
        '[colour_filter] Unknown rule "colour_filter"',
        '[zone] Unknown rule "zone"',
      ]);
      expect(validate({ time_limit: { duration_seconds: 5, colour: 'red' } })).toEqual([
        '[time_limit.colour] Unknown property "colour"',
      ]);
    });

    it('should concatenate structural and schema messages', () => {
      expect(validate({ 'bad-key': 1, object_id: [1, 1] })).toEqual([
        'Invalid rule name format: bad-key',
        '[object_id] Ids must be unique',
      ]);
      expect(sink.byLevel(LogLevel.WARN).map((entry) => entry.message)).toEqual([
        'Rule configuration failed structural validation',
        'Rule configuration failed schema validation',
      ]);
    });

    it('should never throw, whatever it is given', () => {
      fc.assert(
        fc.property(fc.anything(), (raw) => {
          const errors = validate(raw);
          expect(Array.isArray(errors)).toBe(true);
          for (const error of errors) {
            expect(typeof error).toBe('string');
          }
        }),
        propertyConfig
      );
    });
  });

  describe('Single rule validation', () => {
    it('should prefix paths with the rule name', () => {
      const schema = registry.get('request_limit')?.getConfigSchema();
      expect(schema).toBeDefined();
      if (schema === undefined) return;

      expect(
        validator.validateRule('request_limit', { limit: 2, _state: { remaining: -1, initialized_at: 1 } }, schema)
      ).toEqual(['[request_limit._state.remaining] Number must be greater than or equal to 0']);
      expect(validator.validateRule('request_limit', { limit: 2 }, schema)).toEqual([]);
    });
  });

  describe('Message formatting', () => {
    it('should render paths with dots and indices', () => {
      expect(formatPath([])).toBe('(root)');
      expect(formatPath(['a', 'b', 1, 'c'])).toBe('a.b[1].c');
      expect(formatPath([0])).toBe('[0]');
    });

    it('should format issues of any zod error', () => {
      const result = z.object({ name: z.string() }).strict().safeParse({ name: 1, extra: true });
      expect(result.success).toBe(false);
      if (result.success) return;

      expect(formatIssues(result.error)).toEqual([
        '[name] Expected string, received number',
        '[extra] Unknown rule "extra"',
      ]);
      expect(formatIssues(result.error, ['outer'])).toEqual([
        '[outer.name] Expected string, received number',
        '[outer.extra] Unknown property "extra"',
      ]);
    });
  });
});
