/**
 * Planner Errors
 *
 * Whole-run failures. Per-record problems are not thrown: they travel back to
 * the caller as `RecordRejection` values next to the plan.
 */

export class PlanConsolidationError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly recoverable: boolean
  ) {
    super(message);
    this.name = 'PlanConsolidationError';
  }
}

/**
 * The assembled plan broke one or more invariants. Lists every violation.
 */
export class PlanValidationError extends PlanConsolidationError {
  constructor(public readonly violations: readonly string[]) {
    super(
      `Plan validation failed with ${violations.length} violation(s):\n${violations
        .map((violation) => `  - ${violation}`)
        .join('\n')}`,
      'VALIDATION_FAILED',
      false
    );
    this.name = 'PlanValidationError';
  }
}

/**
 * A collaborator could not supply its records.
 */
export class ProducerError extends PlanConsolidationError {
  constructor(
    message: string,
    public readonly producerId: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'PRODUCER_FAILED', true);
    this.name = 'ProducerError';
    if (options && 'cause' in options) this.cause = options.cause;
  }
}

export class ConfigurationError extends PlanConsolidationError {
  constructor(public readonly issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, 'INVALID_CONFIGURATION', false);
    this.name = 'ConfigurationError';
  }
}
