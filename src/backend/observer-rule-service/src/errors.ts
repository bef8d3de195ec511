/**
 * Observer Rule Service Errors
 *
 * Only the persistence errors ever reach the caller of the engine; the rest
 * are caught at the engine boundary and turned into log entries.
 */

/**
 * Raised when a raw configuration fails aggregate schema validation
 */
export class InvalidRuleConfigurationError extends Error {
  constructor(public readonly validationErrors: string[]) {
    super(`Invalid rule configuration: ${validationErrors.join('; ')}`);
    this.name = 'InvalidRuleConfigurationError';
  }
}

/**
 * Raised while building a registry from a rule whose name is unusable
 */
export class InvalidRuleNameError extends Error {
  constructor(
    message: string,
    public readonly ruleName: string
  ) {
    super(message);
    this.name = 'InvalidRuleNameError';
  }
}

/**
 * Wraps a failure inside one rule's state handling or validation
 */
export class RuleProcessingError extends Error {
  constructor(
    public readonly ruleName: string,
    public override readonly cause: unknown,
    message = `Rule "${ruleName}" failed during processing`
  ) {
    super(message);
    this.name = 'RuleProcessingError';
  }
}

/**
 * Raised when updated rule state could not be committed
 */
export class StatePersistenceError extends Error {
  constructor(
    public readonly observerId: number,
    public override readonly cause: unknown,
    message = `Failed to persist rule state for observer ${observerId}`
  ) {
    super(message);
    this.name = 'StatePersistenceError';
  }
}

/**
 * Raised under version locking when another writer committed first
 */
export class StateConflictError extends StatePersistenceError {
  constructor(
    observerId: number,
    public readonly expectedVersion: number,
    public readonly actualVersion: number
  ) {
    super(
      observerId,
      undefined,
      `Observer ${observerId} changed concurrently (expected version ${expectedVersion}, found ${actualVersion})`
    );
    this.name = 'StateConflictError';
  }
}
