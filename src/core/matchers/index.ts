/**
 * Matcher decorators - public entry
 */
export * from './decorators.js';
export * from './errors.js';
export { warnDeprecated, type Deprecation } from './deprecation.js';
export {
  attachMatcher,
  ensureMatcherList,
  getMatchers,
  isSkill,
  withMatchers,
} from './matcherRegistry.js';
export {
  configureMatchers,
  getMatcherSettings,
  resetMatcherSettings,
  type MatcherSettings,
} from './settings.js';
