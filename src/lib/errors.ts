/**
 * Error Types
 *
 * Expected outcomes travel as Result failures. The classes here are for
 * conditions that must abort the current unit of work.
 */

export type InfrastructureComponent = 'counter_store' | 'database';

/**
 * Counter store or relational store unreachable (or too slow).
 * Quota checks fail closed on this error; webhooks surface it as a
 * retryable 5xx so the provider redelivers.
 */
export class InfrastructureUnavailableError extends Error {
  readonly component: InfrastructureComponent;

  constructor(component: InfrastructureComponent, cause?: unknown) {
    super(
      component === 'counter_store'
        ? 'Rate limiter unavailable'
        : 'Database unavailable',
      { cause }
    );
    this.name = 'InfrastructureUnavailableError';
    this.component = component;
  }
}

/**
 * Provider event id already present in the ledger.
 * Thrown inside the webhook transaction so it rolls back.
 */
export class DuplicateEventError extends Error {
  readonly eventId: string;

  constructor(eventId: string) {
    super(`Subscription event already processed: ${eventId}`);
    this.name = 'DuplicateEventError';
    this.eventId = eventId;
  }
}

/**
 * Invalid or missing startup configuration
 */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function isInfrastructureUnavailable(
  err: unknown
): err is InfrastructureUnavailableError {
  return err instanceof InfrastructureUnavailableError;
}
