import type { MatcherDecorator, MatcherDescriptor, SkillHandler } from '../model/Matcher.js';
import { InvalidHandlerError } from './errors.js';

// Keyed by handler identity; the list goes away with the handler.
const matcherLists = new WeakMap<SkillHandler, MatcherDescriptor[]>();

function isHandler(value: unknown): value is SkillHandler {
  return typeof value === 'function';
}

function listFor(handler: SkillHandler): MatcherDescriptor[] {
  if (!isHandler(handler)) {
    throw new InvalidHandlerError(handler);
  }
  let list = matcherLists.get(handler);
  if (!list) {
    list = [];
    matcherLists.set(handler, list);
  }
  return list;
}

/**
 * Make sure `handler` has a matcher list. An existing list is kept as is, so
 * several decorators can stack on one handler. Returns the same handler.
 */
export function ensureMatcherList<H extends SkillHandler>(handler: H): H {
  listFor(handler);
  return handler;
}

/** Append a frozen copy of `matcher`; the caller's object is left as is. */
export function attachMatcher<H extends SkillHandler>(handler: H, matcher: MatcherDescriptor): H {
  listFor(handler).push(Object.freeze({ ...matcher }));
  return handler;
}

/**
 * Matchers attached to `handler`, in the order the decorators were applied.
 *
 * This is the live list. Decoration is expected to finish while skill modules
 * load; appending after a dispatcher has started reading it is unsynchronized.
 */
export function getMatchers(handler: SkillHandler): readonly MatcherDescriptor[] {
  return matcherLists.get(handler) ?? [];
}

/** True once at least one decorator has been applied. */
export function isSkill(handler: unknown): handler is SkillHandler {
  return isHandler(handler) && (matcherLists.get(handler)?.length ?? 0) > 0;
}

/**
 * Apply `decorators` to `handler` in the given order.
 *
 * @example
 * export const deploy = withMatchers(
 *   async (message) => { ... },
 *   matchRegex('deploy (\\w+)'),
 *   matchWebhook('deploy'),
 * );
 */
export function withMatchers<H extends SkillHandler>(handler: H, ...decorators: MatcherDecorator[]): H {
  ensureMatcherList(handler);
  return decorators.reduce<H>((decorated, decorate) => decorate(decorated), handler);
}
