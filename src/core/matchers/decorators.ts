import {
  MatcherKind,
  PARSE_MATCHING_CONDITIONS,
  REGEX_MATCHING_CONDITIONS,
  type MatcherDecorator,
  type MatcherDescriptor,
  type NluMatcherKind,
  type ParseMatchingCondition,
  type RegexMatchingCondition,
  type SkillHandler,
} from '../model/Matcher.js';
import { type Deprecation, warnDeprecated } from './deprecation.js';
import { InvalidMatchingConditionError } from './errors.js';
import { attachMatcher } from './matcherRegistry.js';
import { checkScoreFactor, getMatcherSettings } from './settings.js';

export interface TextMatcherOptions<C extends string> {
  /** Defaults to true. */
  caseSensitive?: boolean;
  /** Defaults to `match`, anchoring at the start of the message. */
  matchingCondition?: C;
  /**
   * Weight used when ranking against NLU matches. Omitted means the
   * configured default; 0 is kept as 0. Negative or non-finite values throw.
   */
  scoreFactor?: number;
}

export type RegexOptions = TextMatcherOptions<RegexMatchingCondition>;
export type ParseOptions = TextMatcherOptions<ParseMatchingCondition>;

function createMatcher(matcher: MatcherDescriptor, deprecation?: Deprecation): MatcherDecorator {
  if (deprecation) warnDeprecated(deprecation);
  return <H extends SkillHandler>(handler: H): H => attachMatcher(handler, matcher);
}

function checkCondition<C extends string>(condition: string, allowed: readonly C[]): C {
  const match = allowed.find((candidate) => candidate === condition);
  if (match === undefined) {
    throw new InvalidMatchingConditionError(condition, allowed);
  }
  return match;
}

function resolveScoreFactor(scoreFactor: number | undefined): number {
  return scoreFactor === undefined ? getMatcherSettings().scoreFactor : checkScoreFactor(scoreFactor);
}

/**
 * Run the skill for every event of the given type, e.g. `message`, `typing`,
 * `reaction` or `file`.
 */
export function matchEvent(eventType: string): MatcherDecorator {
  return createMatcher({ kind: MatcherKind.EventType, eventType });
}

/**
 * Run the skill when a message matches `regex`.
 *
 * `matchingCondition` picks how the expression is applied: `match` anchors at
 * the start, `search` finds it anywhere, `fullmatch` requires the whole text.
 */
export function matchRegex(regex: string, options: RegexOptions = {}): MatcherDecorator {
  return createMatcher({
    kind: MatcherKind.Regex,
    expression: regex,
    caseSensitive: options.caseSensitive ?? true,
    matchingCondition: checkCondition(options.matchingCondition ?? 'match', REGEX_MATCHING_CONDITIONS),
    scoreFactor: resolveScoreFactor(options.scoreFactor),
  });
}

/**
 * Run the skill when a message fits a format template such as
 * `remind me to {task} at {time}`. Only `match` and `search` apply here.
 */
export function matchParse(formatStr: string, options: ParseOptions = {}): MatcherDecorator {
  return createMatcher({
    kind: MatcherKind.ParseFormat,
    expression: formatStr,
    caseSensitive: options.caseSensitive ?? true,
    matchingCondition: checkCondition(options.matchingCondition ?? 'match', PARSE_MATCHING_CONDITIONS),
    scoreFactor: resolveScoreFactor(options.scoreFactor),
  });
}

function nluMatcher(kind: NluMatcherKind, value: string, deprecation?: Deprecation): MatcherDecorator {
  return createMatcher({ kind, value }, deprecation);
}

export function matchDialogflowAction(action: string): MatcherDecorator {
  return nluMatcher(MatcherKind.DialogflowAction, action);
}

export function matchDialogflowIntent(intent: string): MatcherDecorator {
  return nluMatcher(MatcherKind.DialogflowIntent, intent);
}

export function matchLuisaiIntent(intent: string): MatcherDecorator {
  return nluMatcher(MatcherKind.LuisaiIntent, intent);
}

export function matchRasanlu(intent: string): MatcherDecorator {
  return nluMatcher(MatcherKind.RasanluIntent, intent);
}

/**
 * @deprecated Recast.AI is now SAP Conversational AI. Use {@link matchSapcai}.
 */
export function matchRecastai(intent: string): MatcherDecorator {
  return nluMatcher(MatcherKind.SapcaiIntent, intent, {
    name: 'matchRecastai',
    replacement: 'matchSapcai',
    reason: 'Recast.AI is now called SAP Conversational AI',
  });
}

export function matchSapcai(intent: string): MatcherDecorator {
  return nluMatcher(MatcherKind.SapcaiIntent, intent);
}

export function matchWatson(intent: string): MatcherDecorator {
  return nluMatcher(MatcherKind.WatsonIntent, intent);
}

export function matchWitai(intent: string): MatcherDecorator {
  return nluMatcher(MatcherKind.WitaiIntent, intent);
}

/**
 * Run the skill on a cron schedule. The expression is checked by the
 * scheduler, not here.
 */
export function matchCrontab(crontab: string, timezone?: string): MatcherDecorator {
  return createMatcher({ kind: MatcherKind.Crontab, crontab, timezone: timezone ?? null });
}

/** Run the skill when the named webhook is called. */
export function matchWebhook(webhook: string): MatcherDecorator {
  return createMatcher({ kind: MatcherKind.Webhook, webhook });
}

/**
 * Run the skill for every message. Takes no arguments, so it works both
 * applied directly and called first:
 *
 * @example
 * matchAlways(handler);
 * matchAlways()(handler);
 */
export function matchAlways<H extends SkillHandler>(handler: H): H;
export function matchAlways(): MatcherDecorator;
export function matchAlways<H extends SkillHandler>(handler?: H): H | MatcherDecorator {
  const decorate = createMatcher({ kind: MatcherKind.Always, always: true });
  return handler === undefined ? decorate : decorate(handler);
}
