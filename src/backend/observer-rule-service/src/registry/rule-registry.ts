/**
 * Rule Registry
 *
 * Indexes the available rules by name, builds the aggregate configuration
 * schema out of their individual schemas, and turns a raw observer
 * configuration into priority-ordered application units.
 *
 * @tested tests/property/rule-registry.property.test.ts
 */

import { z } from 'zod';
import {
  getLogger,
  isJsonObject,
  RULE_NAME_PATTERN,
  splitRuleConfig,
  type Logger,
  type RuleConfig,
} from '@mapwatch/shared';

import { InvalidRuleConfigurationError, InvalidRuleNameError } from '../errors.js';
import { createBuiltinRules, systemClock, type Clock, type ObserverRule, type SliceSchema } from '../rules/index.js';
import { RuleConfigValidator, ValidationMessages } from '../validation/config-validator.js';

/**
 * What the aggregate schema does with keys no rule claims
 * - reject: each unknown key is a validation error
 * - ignore: unknown keys pass validation and are skipped when building units
 */
export const UnknownRulePolicy = {
  REJECT: 'reject',
  IGNORE: 'ignore',
} as const;

export type UnknownRulePolicy = (typeof UnknownRulePolicy)[keyof typeof UnknownRulePolicy];

export interface UnknownRuleOptions {
  unknownRules?: UnknownRulePolicy;
}

/**
 * One rule paired with this observer's configuration for it; lives for one evaluation
 */
export interface RuleApplicationUnit {
  rule: ObserverRule;
  config: RuleConfig;
  priority: number;
}

export interface RuleRegistryOptions {
  logger: Logger;
  validator: RuleConfigValidator;
}

export const AT_LEAST_ONE_RULE_MESSAGE = 'Configuration must contain at least one rule';

const SANITIZE_PATTERN = /[^A-Za-z0-9_]/g;

export function sanitizeRuleName(name: string): string {
  return name.replace(SANITIZE_PATTERN, '');
}

function assertValidRuleName(name: string): void {
  if (name.length === 0) {
    throw new InvalidRuleNameError('Rule name cannot be empty', name);
  }
  if (!/^[A-Za-z]/.test(name)) {
    throw new InvalidRuleNameError(`Rule name must start with a letter: ${name}`, name);
  }
  if (!RULE_NAME_PATTERN.test(name)) {
    throw new InvalidRuleNameError(ValidationMessages.invalidRuleName(name), name);
  }
}

export class RuleRegistry {
  private readonly rules: Map<string, ObserverRule> = new Map();
  private readonly ordered: ObserverRule[];
  private readonly schemaCache: Map<UnknownRulePolicy, SliceSchema> = new Map();
  private readonly logger: Logger;
  private readonly validator: RuleConfigValidator;

  /**
   * @throws InvalidRuleNameError for an empty, malformed or duplicate name
   */
  constructor(rules: readonly ObserverRule[], options: Partial<RuleRegistryOptions> = {}) {
    this.logger = options.logger ?? getLogger();
    this.validator = options.validator ?? new RuleConfigValidator(this.logger);

    for (const rule of rules) {
      const name = rule.getName();
      assertValidRuleName(name);
      if (this.rules.has(name)) {
        throw new InvalidRuleNameError(`Duplicate rule name: ${name}`, name);
      }
      this.rules.set(name, rule);
    }

    this.ordered = [...this.rules.values()].sort((a, b) => a.getPriority() - b.getPriority());

    this.logger.info('Observer rules registered', { rules: this.names() });
  }

  /**
   * Looks a rule up by name after stripping characters a rule name cannot contain
   */
  get(name: string): ObserverRule | undefined {
    const sanitized = sanitizeRuleName(name);
    const rule = this.lookup(sanitized);

    if (rule === undefined) {
      this.logger.warn('Observer rule not found', {
        requestedName: name,
        sanitizedName: sanitized,
        availableRules: this.names(),
      });
    }

    return rule;
  }

  /**
   * Same name handling as get(), without the warning
   */
  has(name: string): boolean {
    return this.lookup(sanitizeRuleName(name)) !== undefined;
  }

  private lookup(sanitized: string): ObserverRule | undefined {
    return /^[A-Za-z]/.test(sanitized) ? this.rules.get(sanitized) : undefined;
  }

  /**
   * All rules, lowest priority value first
   */
  all(): ObserverRule[] {
    return [...this.ordered];
  }

  names(): string[] {
    return this.ordered.map((rule) => rule.getName());
  }

  /**
   * Schema of a whole configuration: one optional property per rule, at least one present
   */
  getAggregateSchema(options: UnknownRuleOptions = {}): SliceSchema {
    const policy = options.unknownRules ?? UnknownRulePolicy.REJECT;
    const cached = this.schemaCache.get(policy);
    if (cached !== undefined) {
      return cached;
    }

    const shape: z.ZodRawShape = {};
    for (const rule of this.ordered) {
      shape[rule.getName()] = rule.getConfigSchema().optional();
    }

    const object = z.object(shape);
    const base: SliceSchema = policy === UnknownRulePolicy.REJECT ? object.strict() : object.passthrough();
    const schema = base.refine((config) => isJsonObject(config) && Object.keys(config).length > 0, {
      message: AT_LEAST_ONE_RULE_MESSAGE,
    });

    this.schemaCache.set(policy, schema);
    return schema;
  }

  /**
   * Validates a raw configuration and resolves it into ordered application units
   *
   * Units with equal priority keep the order of the configuration's keys.
   *
   * @throws InvalidRuleConfigurationError with every validation message
   */
  createFromConfig(rawConfig: unknown, options: UnknownRuleOptions = {}): RuleApplicationUnit[] {
    const errors = this.validator.validate(rawConfig, this.getAggregateSchema(options));
    if (errors.length > 0) {
      throw new InvalidRuleConfigurationError(errors);
    }
    if (!isJsonObject(rawConfig)) {
      throw new InvalidRuleConfigurationError([ValidationMessages.NOT_AN_OBJECT]);
    }

    const units: RuleApplicationUnit[] = [];
    for (const [name, slice] of Object.entries(rawConfig)) {
      const rule = this.get(name);
      if (rule === undefined) {
        this.logger.info('Skipping unknown observer rule', { rule: name });
        continue;
      }
      units.push({ rule, config: splitRuleConfig(slice), priority: rule.getPriority() });
    }

    units.sort((a, b) => a.priority - b.priority);

    this.logger.debug('Rule application units created', { rules: units.map((unit) => unit.rule.getName()) });
    return units;
  }
}

/**
 * Registry over the built-in rules
 */
export function createDefaultRuleRegistry(
  options: Partial<RuleRegistryOptions> & { clock?: Clock } = {}
): RuleRegistry {
  return new RuleRegistry(createBuiltinRules(options.clock ?? systemClock), options);
}
