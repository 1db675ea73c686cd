import { getMatcherSettings } from './settings.js';

export interface Deprecation {
  /** Name of the deprecated factory, e.g. `matchRecastai`. */
  name: string;
  replacement: string;
  reason?: string;
}

/**
 * Log a deprecation notice for a matcher factory. Issued once per factory
 * call; silenced when `deprecationWarnings` is off.
 */
export function warnDeprecated(deprecation: Deprecation): void {
  const { deprecationWarnings, logger } = getMatcherSettings();
  if (!deprecationWarnings) return;

  const reason = deprecation.reason ? `${deprecation.reason}, ` : '';
  logger.warn(
    'matchers',
    `${reason}${deprecation.name} will stop working in the future. Use ${deprecation.replacement} instead.`,
  );
}
