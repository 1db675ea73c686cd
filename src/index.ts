export * from './core/model/Matcher.js';
export * from './core/matchers/index.js';
export * from './core/skills/skillRegistry.js';
export { REGEX_PARSE_SCORE_FACTOR, loadConfig, resolveConfig } from './infra/config/config.js';
export type { AppConfigRequired } from './infra/config/config.js';
export { createLogger, type Logger, type LogLevel } from './infra/logger/logger.js';
