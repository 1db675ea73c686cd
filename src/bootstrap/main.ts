import { loadConfig } from '../infra/config/config.js';
import { createLogger } from '../infra/logger/logger.js';
import { configureMatchers } from '../core/matchers/index.js';
import { describeMatcher } from '../core/model/Matcher.js';
import { SkillRegistry } from '../core/skills/skillRegistry.js';

/**
 * Load the bundled skill modules and print what each one is listening for.
 */
export async function start(): Promise<SkillRegistry> {
  const cfg = loadConfig();
  const logger = createLogger(cfg);
  logger.info('bootstrap', `Starting ${cfg.app.name} in ${cfg.app.env}`);

  // Settings must be in place before skill modules are imported.
  configureMatchers({
    logger,
    scoreFactor: cfg.matchers.scoreFactor,
    deprecationWarnings: cfg.matchers.deprecationWarnings,
  });

  const registry = new SkillRegistry(logger);
  const opsSkills = await import('../apps/opsSkills/opsSkills.js');
  registry.loadModule({ ...opsSkills });

  for (const skill of registry.getAll().values()) {
    logger.info('bootstrap', `${skill.name}: ${skill.matchers.map(describeMatcher).join(', ')}`);
  }
  return registry;
}
