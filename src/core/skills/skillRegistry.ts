import type { Logger } from '../../infra/logger/logger.js';
import {
  describeMatcher,
  MatcherKind,
  type CrontabMatcher,
  type MatcherDescriptor,
  type SkillHandler,
  type WebhookMatcher,
} from '../model/Matcher.js';
import { InvalidHandlerError } from '../matchers/errors.js';
import { getMatchers, isSkill } from '../matchers/matcherRegistry.js';

export interface RegisteredSkill {
  name: string;
  handler: SkillHandler;
  matchers: readonly MatcherDescriptor[];
}

export interface SkillMatch<M extends MatcherDescriptor> {
  skill: RegisteredSkill;
  matcher: M;
}

/**
 * Collects decorated skill handlers by name so an external dispatcher,
 * scheduler or webhook server can look them up. Nothing here runs a skill.
 */
export class SkillRegistry {
  private skills: Map<string, RegisteredSkill> = new Map();

  constructor(private logger: Logger) {}

  /**
   * Register one handler. Returns false, with a warning, when the handler
   * carries no matchers and could never be triggered.
   */
  public register(name: string, handler: SkillHandler): boolean {
    if (typeof handler !== 'function') {
      throw new InvalidHandlerError(handler);
    }
    if (!isSkill(handler)) {
      this.logger.warn('skills', `Skipping ${name}: no matchers attached`);
      return false;
    }
    if (this.skills.has(name)) {
      this.logger.warn('skills', `Skill already registered: ${name}, overwriting`);
    }

    const matchers = getMatchers(handler);
    this.skills.set(name, { name, handler, matchers });
    this.logger.debug('skills', `Registered ${name}: ${matchers.map(describeMatcher).join(', ')}`);
    return true;
  }

  /**
   * Register every decorated function in a skill module's exports, in key
   * order of the given record. A spread module namespace lists its keys
   * alphabetically. Undecorated exports are ignored.
   */
  public loadModule(exports: Record<string, unknown>): string[] {
    const loaded: string[] = [];
    for (const [name, value] of Object.entries(exports)) {
      if (isSkill(value) && this.register(name, value)) {
        loaded.push(name);
      }
    }
    this.logger.info('skills', `Loaded ${loaded.length} skill(s)`);
    return loaded;
  }

  public get(name: string): RegisteredSkill | undefined {
    return this.skills.get(name);
  }

  public has(name: string): boolean {
    return this.skills.has(name);
  }

  public getAll(): Map<string, RegisteredSkill> {
    return new Map(this.skills);
  }

  public deregister(name: string): boolean {
    return this.skills.delete(name);
  }

  public clear(): void {
    this.skills.clear();
  }

  /** Skills with at least one matcher of `kind`, in registration order. */
  public findByKind(kind: MatcherKind): RegisteredSkill[] {
    return [...this.skills.values()].filter((skill) =>
      skill.matchers.some((matcher) => matcher.kind === kind),
    );
  }

  public webhooks(): SkillMatch<WebhookMatcher>[] {
    return this.collect((matcher): matcher is WebhookMatcher => matcher.kind === MatcherKind.Webhook);
  }

  public crontabs(): SkillMatch<CrontabMatcher>[] {
    return this.collect((matcher): matcher is CrontabMatcher => matcher.kind === MatcherKind.Crontab);
  }

  private collect<M extends MatcherDescriptor>(
    predicate: (matcher: MatcherDescriptor) => matcher is M,
  ): SkillMatch<M>[] {
    const found: SkillMatch<M>[] = [];
    for (const skill of this.skills.values()) {
      for (const matcher of skill.matchers) {
        if (predicate(matcher)) found.push({ skill, matcher });
      }
    }
    return found;
  }
}
