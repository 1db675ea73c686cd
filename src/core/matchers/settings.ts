import { loadConfig } from '../../infra/config/config.js';
import { createLogger, type Logger } from '../../infra/logger/logger.js';
import { InvalidScoreFactorError } from './errors.js';

export interface MatcherSettings {
  /** Used by regex and parse-format matchers when no score factor is given. */
  scoreFactor: number;
  deprecationWarnings: boolean;
  logger: Logger;
}

function defaults(): MatcherSettings {
  const cfg = loadConfig();
  return {
    scoreFactor: cfg.matchers.scoreFactor,
    deprecationWarnings: cfg.matchers.deprecationWarnings,
    logger: createLogger(cfg),
  };
}

// Built on first use so importing the decorators reads no config.
let current: MatcherSettings | null = null;

export function getMatcherSettings(): Readonly<MatcherSettings> {
  if (!current) current = defaults();
  return current;
}

/**
 * Override matcher settings. Call before skill modules load: descriptors copy
 * the score factor when they are built.
 */
export function configureMatchers(overrides: Partial<MatcherSettings>): void {
  if (overrides.scoreFactor !== undefined) checkScoreFactor(overrides.scoreFactor);
  current = { ...getMatcherSettings(), ...overrides };
}

export function resetMatcherSettings(): void {
  current = null;
}

/** Score factors are finite and not negative; throws otherwise. */
export function checkScoreFactor(scoreFactor: number): number {
  if (!Number.isFinite(scoreFactor) || scoreFactor < 0) {
    throw new InvalidScoreFactorError(scoreFactor);
  }
  return scoreFactor;
}
