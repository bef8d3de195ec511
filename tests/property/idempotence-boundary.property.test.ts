/**
 * Property 5: Idempotence Boundary
 *
 * Stateless rules SHALL be pure: for the same configuration, applying them
 * once or twice, now or later, yields the same objects and never writes
 * state. Stateful rules SHALL advance their state on every evaluation, and
 * only they cause writes.
 *
 * @file src/backend/observer-rule-service/src/rules/id-list-rule.ts
 * @file src/backend/observer-rule-service/src/rules/time-range-rule.ts
 * @file src/backend/observer-rule-service/src/rules/request-limit-rule.ts
 * @file src/backend/observer-rule-service/src/engine/observer-rule-engine.ts
 */

import fc from 'fast-check';
import { describe, expect, it } from 'vitest';

import {
  InMemoryGeoObjectRepository,
  InMemoryLogSink,
  InMemoryObserverStore,
  Logger,
  type GeoObject,
  type Observer,
  type RuleConfig,
} from '../../src/backend/shared/src/index.js';
import {
  ObjectIdRule,
  ObserverRuleEngine,
  RequestLimitRule,
  TimeRangeRule,
  createDefaultRuleRegistry,
} from '../../src/backend/observer-rule-service/src/index.js';

// Property test configuration
const propertyConfig = {
  numRuns: 50,
  verbose: false,
};

const clock = () => new Date('2024-05-01T12:00:00Z');

const geoObjectArbitrary: fc.Arbitrary<GeoObject> = fc.record({
  id: fc.integer({ min: 1, max: 200 }),
  name: fc.string({ minLength: 1, maxLength: 30 }),
  mapId: fc.constant(1),
  sideId: fc.option(fc.integer({ min: 1, max: 10 }), { nil: null }),
  geometryType: fc.constantFrom('point' as const, 'polygon' as const, 'circle' as const, 'linestring' as const),
  ttlSeconds: fc.constant(null),
  createdAt: fc.date({ min: new Date('2020-01-01'), max: new Date('2024-01-01'), noInvalidDate: true }),
  updatedAt: fc.constant(null),
});

const timeOfDay = fc
  .tuple(fc.integer({ min: 0, max: 23 }), fc.integer({ min: 0, max: 59 }))
  .map(([hours, minutes]) => `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`);

describe('Property 5: Idempotence Boundary', () => {
  it('should give the same result when a stateless rule is applied twice', () => {
    fc.assert(
      fc.property(
        fc.array(geoObjectArbitrary, { maxLength: 20 }),
        timeOfDay,
        timeOfDay,
        (objects, start, end) => {
          const rule = new TimeRangeRule(clock);
          const config: RuleConfig = { parameters: { start_time: start, end_time: end } };

          const once = rule.applyToObjects(objects, config);
          const twice = rule.applyToObjects(once, config);

          expect(twice).toEqual(once);
          expect(rule.applyToObjects(objects, config)).toEqual(once);
        }
      ),
      propertyConfig
    );
  });

  it('should bind the same ids every time for the same id list', () => {
    fc.assert(
      fc.property(fc.array(fc.oneof(fc.integer({ min: -5, max: 50 }), fc.string()), { maxLength: 20 }), (entries) => {
        const rule = new ObjectIdRule();
        const repository = new InMemoryGeoObjectRepository();
        const first = repository.createQuery();
        const second = repository.createQuery();

        rule.applyToQuery(first, { parameters: entries });
        rule.applyToQuery(second, { parameters: entries });

        expect(second.getPredicates()).toEqual(first.getPredicates());
        expect(second.getParameters()).toEqual(first.getParameters());
      }),
      propertyConfig
    );
  });

  it('should advance request state on every update', () => {
    fc.assert(
      fc.property(fc.integer({ min: 2, max: 1000 }), (limit) => {
        const rule = new RequestLimitRule(clock);
        const initial = rule.initializeState({ parameters: { limit } });
        const afterOne = rule.updateState({ parameters: { limit }, state: initial });
        const afterTwo = rule.updateState({ parameters: { limit }, state: afterOne });

        expect(afterOne['remaining']).toBe(limit - 1);
        expect(afterTwo['remaining']).toBe(limit - 2);
      }),
      propertyConfig
    );
  });

  it('should only write state for configurations with a stateful rule', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.uniqueArray(fc.integer({ min: 1, max: 4 }), { minLength: 1, maxLength: 4 }),
        fc.boolean(),
        async (objectIds, withBudget) => {
          const logger = new Logger({ sinks: [new InMemoryLogSink()] });
          const observer: Observer = {
            id: 1,
            name: 'Ridge lookout',
            mapId: 1,
            version: 0,
            rules: withBudget ? { object_id: objectIds, request_limit: { limit: 100 } } : { object_id: objectIds },
          };
          const store = new InMemoryObserverStore([observer]);
          const repository = new InMemoryGeoObjectRepository(
            [1, 2, 3, 4].map((id) => ({
              id,
              name: `Object ${id}`,
              mapId: 1,
              sideId: null,
              geometryType: 'point' as const,
              ttlSeconds: null,
              createdAt: new Date('2024-01-01T00:00:00Z'),
              updatedAt: null,
            }))
          );
          const engine = new ObserverRuleEngine(
            { registry: createDefaultRuleRegistry({ logger, clock }), repository, persistence: store, logger },
            { clock }
          );

          const first = await engine.evaluate(observer);
          const second = await engine.evaluate(observer);

          expect(second.objects).toEqual(first.objects);
          expect(store.getCommitCount()).toBe(withBudget ? 2 : 0);
        }
      ),
      propertyConfig
    );
  });
});
