/**
 * Errors raised while decorating skills. They are thrown synchronously when a
 * skill module loads, so a bad declaration fails before dispatch starts.
 */

export class MatcherError extends Error {
  constructor(
    public readonly code: string,
    message: string,
  ) {
    super(message);
    this.name = 'MatcherError';
  }
}

export class InvalidHandlerError extends MatcherError {
  constructor(public readonly received: unknown) {
    super('INVALID_HANDLER', `Skill handler must be a function, got ${describeValue(received)}`);
    this.name = 'InvalidHandlerError';
  }
}

export class InvalidMatchingConditionError extends MatcherError {
  constructor(
    public readonly condition: unknown,
    public readonly allowed: readonly string[],
  ) {
    super(
      'INVALID_MATCHING_CONDITION',
      `Unknown matching condition ${JSON.stringify(condition)}, expected one of: ${allowed.join(', ')}`,
    );
    this.name = 'InvalidMatchingConditionError';
  }
}

export class InvalidScoreFactorError extends MatcherError {
  constructor(public readonly scoreFactor: unknown) {
    super(
      'INVALID_SCORE_FACTOR',
      `Score factor must be a finite number >= 0, got ${String(scoreFactor)}`,
    );
    this.name = 'InvalidScoreFactorError';
  }
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}
