/**
 * Observer Rule Engine
 *
 * Produces the list of geo objects one observer may see. Rules narrow the
 * view in two passes: first the storage query (applyToQuery, in priority
 * order), then the objects it returned (applyToObjects, same order).
 *
 * Failure model:
 * - no rules: the default view, without touching the registry
 * - unusable configuration: the default view, logged as an error
 * - a single rule failing: that rule is skipped, the rest still apply
 * - state that cannot be stored: StatePersistenceError reaches the caller
 *
 * @tested tests/integration/observer-rule-engine.integration.test.ts
 * @tested tests/integration/state-persistence.integration.test.ts
 */

import { isDeepStrictEqual } from 'node:util';
import { v4 as uuidv4 } from 'uuid';
import {
  createActiveObjectsQuery,
  createLogger,
  getLogger,
  isEmptyRuleConfiguration,
  isJsonObject,
  joinRuleConfig,
  MetricsCollector,
  toError,
  type GeoObject,
  type GeoObjectRepository,
  type JsonValue,
  type LogSink,
  type Logger,
  type Observer,
  type ObserverPersistence,
  type ObserverTransaction,
  type RawRuleConfiguration,
  type RuleState,
} from '@mapwatch/shared';

import { loadEngineConfig, StateLocking, type EngineConfig } from '../config.js';
import { InvalidRuleConfigurationError, RuleProcessingError, StateConflictError, StatePersistenceError } from '../errors.js';
import { isStatefulRule, systemClock, type Clock } from '../rules/observer-rule.js';
import { createDefaultRuleRegistry, type RuleApplicationUnit, type RuleRegistry } from '../registry/rule-registry.js';
import { RuleConfigValidator } from '../validation/config-validator.js';

/**
 * How an evaluation arrived at its objects
 * - default: the observer has no rules
 * - fallback: the rules could not be used, so the default view was served
 * - filtered: the rules were applied
 */
export const EvaluationOutcome = {
  DEFAULT: 'default',
  FALLBACK: 'fallback',
  FILTERED: 'filtered',
} as const;

export type EvaluationOutcome = (typeof EvaluationOutcome)[keyof typeof EvaluationOutcome];

export interface ObserverFilterResult {
  objects: GeoObject[];
  outcome: EvaluationOutcome;
  correlationId: string;
  /** Rules that took part in filtering, in application order */
  appliedRules: string[];
  /** Unknown rules and rules dropped by a processing or validation failure */
  skippedRules: string[];
  /** Whether updated rule state was committed */
  stateChanged: boolean;
  validationErrors: string[];
}

export interface ObserverRuleEngineConfig {
  stateLocking: StateLocking;
  clock: Clock;
}

export const DEFAULT_OBSERVER_RULE_ENGINE_CONFIG: ObserverRuleEngineConfig = {
  stateLocking: StateLocking.REFRESH,
  clock: systemClock,
};

export interface ObserverRuleEngineDependencies {
  registry: RuleRegistry;
  repository: GeoObjectRepository;
  persistence: ObserverPersistence;
  validator?: RuleConfigValidator;
  logger?: Logger;
  metrics?: MetricsCollector;
}

interface ProcessedUnit {
  unit: RuleApplicationUnit;
  /** Present only when the rule's state has to be written back */
  nextState?: RuleState;
}

export class ObserverRuleEngine {
  private registry: RuleRegistry;
  private repository: GeoObjectRepository;
  private persistence: ObserverPersistence;
  private validator: RuleConfigValidator;
  private logger: Logger;
  private metrics: MetricsCollector;
  private config: ObserverRuleEngineConfig;

  constructor(dependencies: ObserverRuleEngineDependencies, config: Partial<ObserverRuleEngineConfig> = {}) {
    this.registry = dependencies.registry;
    this.repository = dependencies.repository;
    this.persistence = dependencies.persistence;
    this.logger = dependencies.logger ?? getLogger();
    this.validator = dependencies.validator ?? new RuleConfigValidator(this.logger);
    this.metrics = dependencies.metrics ?? new MetricsCollector();
    this.config = { ...DEFAULT_OBSERVER_RULE_ENGINE_CONFIG, ...config };
  }

  /**
   * Objects visible to the observer right now
   *
   * @throws StatePersistenceError when updated rule state cannot be committed
   */
  async getFilteredObjects(observer: Observer): Promise<GeoObject[]> {
    const result = await this.evaluate(observer);
    return result.objects;
  }

  /**
   * Same pipeline as getFilteredObjects, with a report of what happened
   */
  async evaluate(observer: Observer): Promise<ObserverFilterResult> {
    const stopTimer = this.metrics.startTimer();
    const correlationId = uuidv4();
    const logger = this.logger.child({
      correlationId,
      context: { observerId: observer.id, observerName: observer.name },
    });

    try {
      const result = await this.run(observer, correlationId, logger);
      this.metrics.recordEvaluation(result.outcome, stopTimer().durationMs);
      return result;
    } catch (error) {
      this.metrics.recordEvaluation('error', stopTimer().durationMs);
      throw error;
    }
  }

  private async run(observer: Observer, correlationId: string, logger: Logger): Promise<ObserverFilterResult> {
    const now = this.config.clock();

    if (isEmptyRuleConfiguration(observer.rules)) {
      logger.debug('Observer has no rules; serving default view');
      return {
        ...this.emptyReport(correlationId, EvaluationOutcome.DEFAULT),
        objects: await this.repository.findActiveByMap(observer.mapId, now),
      };
    }

    const rawConfig = observer.rules;
    const expectedVersion = observer.version;

    let units: RuleApplicationUnit[];
    try {
      units = this.registry.createFromConfig(rawConfig, { unknownRules: 'ignore' });
    } catch (error) {
      const validationErrors = error instanceof InvalidRuleConfigurationError ? error.validationErrors : [];
      logger.error('Observer rule configuration is invalid; serving default view', toError(error), {
        observerId: observer.id,
        observerName: observer.name,
        validationErrors,
      });
      this.metrics.recordFallback(error instanceof InvalidRuleConfigurationError ? 'invalid_configuration' : 'registry_error');

      return {
        ...this.emptyReport(correlationId, EvaluationOutcome.FALLBACK),
        objects: await this.repository.findActiveByMap(observer.mapId, now),
        validationErrors,
      };
    }

    const ruleNames = isJsonObject(rawConfig) ? Object.keys(rawConfig) : [];
    const skippedRules = ruleNames.filter((name) => !this.registry.has(name));

    const applied: RuleApplicationUnit[] = [];
    const updatedSlices: RawRuleConfiguration = {};

    for (const unit of units) {
      const name = unit.rule.getName();
      try {
        const processed = this.processUnit(unit, logger);
        if (processed === null) {
          skippedRules.push(name);
          continue;
        }
        applied.push(processed.unit);
        if (processed.nextState !== undefined) {
          updatedSlices[name] = joinRuleConfig({ parameters: unit.config.parameters, state: processed.nextState });
        }
      } catch (error) {
        const failure = new RuleProcessingError(name, error);
        logger.error(failure.message, toError(error), { observerId: observer.id, rule: name });
        this.metrics.recordRuleFailure(name);
        skippedRules.push(name);
      }
    }

    const stateChanged = Object.keys(updatedSlices).length > 0;
    if (stateChanged && isJsonObject(rawConfig)) {
      await this.persistState(observer, { ...rawConfig, ...updatedSlices }, expectedVersion, logger);
    }

    let query = createActiveObjectsQuery(this.repository, observer.mapId, now);
    for (const unit of applied) {
      query = unit.rule.applyToQuery(query, unit.config);
    }

    let objects = await query.execute();
    for (const unit of applied) {
      objects = unit.rule.applyToObjects(objects, unit.config);
    }

    const appliedRules = applied.map((unit) => unit.rule.getName());
    logger.info('Observer rules applied', { appliedRules, skippedRules, objectCount: objects.length });

    return {
      objects,
      outcome: EvaluationOutcome.FILTERED,
      correlationId,
      appliedRules,
      skippedRules,
      stateChanged,
      validationErrors: [],
    };
  }

  /**
   * Runs the state lifecycle of one unit and re-validates its slice
   *
   * The returned unit carries the state as it was before this evaluation's
   * update, so the decision and the persisted state are one step apart.
   * Returns null when the rule has to be skipped.
   */
  private processUnit(unit: RuleApplicationUnit, logger: Logger): ProcessedUnit | null {
    const { rule, config } = unit;
    const name = rule.getName();

    let effectiveUnit = unit;
    let nextState: RuleState | undefined;

    if (isStatefulRule(rule)) {
      let effectiveState = config.state;
      let changed = false;

      if (effectiveState === undefined) {
        effectiveState = rule.initializeState(config);
        changed = true;
      }

      const effectiveConfig = { parameters: config.parameters, state: effectiveState };
      const updated = rule.updateState(effectiveConfig);
      if (!isDeepStrictEqual(updated, effectiveState)) {
        changed = true;
      }

      effectiveUnit = { ...unit, config: effectiveConfig };
      nextState = changed ? updated : undefined;
    }

    const slice: JsonValue = joinRuleConfig({ parameters: config.parameters, state: nextState ?? effectiveUnit.config.state });
    const errors = this.validator.validateRule(name, slice, rule.getConfigSchema());
    if (errors.length > 0) {
      logger.warn('Observer rule configuration is invalid; skipping rule', { rule: name, errors });
      this.metrics.recordRuleSkipped(name);
      return null;
    }

    return { unit: effectiveUnit, nextState };
  }

  private async persistState(
    observer: Observer,
    rules: RawRuleConfiguration,
    expectedVersion: number,
    logger: Logger
  ): Promise<void> {
    let transaction: ObserverTransaction | undefined;
    try {
      transaction = await this.persistence.beginTransaction();
      await transaction.refresh(observer);

      if (this.config.stateLocking === StateLocking.VERSION && observer.version !== expectedVersion) {
        throw new StateConflictError(observer.id, expectedVersion, observer.version);
      }

      await transaction.saveRules(observer, rules);
      await transaction.commit();

      this.metrics.recordStateWrite(true);
      logger.debug('Observer rule state persisted', { version: observer.version });
    } catch (error) {
      this.metrics.recordStateWrite(false);

      if (transaction !== undefined) {
        try {
          await transaction.rollback();
        } catch (rollbackError) {
          logger.error('Rollback of observer rule state failed', toError(rollbackError), { observerId: observer.id });
        }
      }

      logger.error('Failed to persist observer rule state', toError(error), { observerId: observer.id });

      if (error instanceof StatePersistenceError) {
        throw error;
      }
      throw new StatePersistenceError(observer.id, error);
    }
  }

  private emptyReport(correlationId: string, outcome: EvaluationOutcome): Omit<ObserverFilterResult, 'objects'> {
    return {
      outcome,
      correlationId,
      appliedRules: [],
      skippedRules: [],
      stateChanged: false,
      validationErrors: [],
    };
  }
}

/**
 * Wires an engine over the built-in rules from service settings
 */
export function createObserverRuleEngine(
  repository: GeoObjectRepository,
  persistence: ObserverPersistence,
  settings: EngineConfig = loadEngineConfig(),
  overrides: { clock?: Clock; sinks?: LogSink[]; metrics?: MetricsCollector } = {}
): ObserverRuleEngine {
  const loggerConfig = { serviceName: settings.serviceName, minLevel: settings.logLevel };
  const logger = createLogger(overrides.sinks === undefined ? loggerConfig : { ...loggerConfig, sinks: overrides.sinks });
  const clock = overrides.clock ?? systemClock;
  const validator = new RuleConfigValidator(logger);

  return new ObserverRuleEngine(
    {
      registry: createDefaultRuleRegistry({ logger, validator, clock }),
      repository,
      persistence,
      validator,
      logger,
      metrics: overrides.metrics ?? new MetricsCollector({ defaultTags: { service: settings.serviceName } }),
    },
    { stateLocking: settings.stateLocking, clock }
  );
}
