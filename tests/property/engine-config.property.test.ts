/**
 * Property 7: Engine Configuration Loading
 *
 * For any environment, unset or empty variables SHALL fall back to the
 * defaults, supported values SHALL be taken as given, and an unsupported
 * value SHALL fail at startup rather than at the first evaluation.
 *
 * @file src/backend/observer-rule-service/src/config.ts
 */

import fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';

import {
  DEFAULT_ENGINE_CONFIG,
  StateLocking,
  loadEngineConfig,
} from '../../src/backend/observer-rule-service/src/index.js';

// Property test configuration
const propertyConfig = {
  numRuns: 100,
  verbose: false,
};

describe('Property 7: Engine Configuration Loading', () => {
  it('should use the defaults when nothing is set', () => {
    expect(loadEngineConfig({})).toEqual({
      serviceName: 'observer-rule-service',
      logLevel: 'info',
      stateLocking: 'refresh',
    });
    expect(loadEngineConfig({})).toEqual(DEFAULT_ENGINE_CONFIG);
  });

  it('should treat empty variables as unset', () => {
    expect(
      loadEngineConfig({ MAPWATCH_SERVICE_NAME: '', MAPWATCH_LOG_LEVEL: '', MAPWATCH_STATE_LOCKING: '' })
    ).toEqual(DEFAULT_ENGINE_CONFIG);
  });

  it('should take every supported combination as given', () => {
    fc.assert(
      fc.property(
        fc.string({ minLength: 1, maxLength: 40 }),
        fc.constantFrom('debug' as const, 'info' as const, 'warn' as const, 'error' as const),
        fc.constantFrom(StateLocking.REFRESH, StateLocking.VERSION),
        (serviceName, logLevel, stateLocking) => {
          expect(
            loadEngineConfig({
              MAPWATCH_SERVICE_NAME: serviceName,
              MAPWATCH_LOG_LEVEL: logLevel,
              MAPWATCH_STATE_LOCKING: stateLocking,
            })
          ).toEqual({ serviceName, logLevel, stateLocking });
        }
      ),
      propertyConfig
    );
  });

  it('should ignore unrelated variables', () => {
    expect(loadEngineConfig({ PATH: '/usr/bin', MAPWATCH_STATE_LOCKING: 'version' })).toEqual({
      ...DEFAULT_ENGINE_CONFIG,
      stateLocking: 'version',
    });
  });

  it('should reject unsupported values', () => {
    expect(() => loadEngineConfig({ MAPWATCH_LOG_LEVEL: 'verbose' })).toThrow(ZodError);
    expect(() => loadEngineConfig({ MAPWATCH_STATE_LOCKING: 'pessimistic' })).toThrow(ZodError);
  });
});
