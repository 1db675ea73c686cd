/**
 * Any callable a skill module exports. The matcher decorators never wrap or
 * replace it; they only record metadata about when it should run.
 */
export type SkillHandler = (...args: never[]) => unknown;

/**
 * Decorator produced by every `match*` factory. Returns the handler it was
 * given, so decorators compose.
 */
export type MatcherDecorator = <H extends SkillHandler>(handler: H) => H;

export enum MatcherKind {
  EventType = 'event_type',
  Regex = 'regex',
  ParseFormat = 'parse_format',
  DialogflowAction = 'dialogflow_action',
  DialogflowIntent = 'dialogflow_intent',
  LuisaiIntent = 'luisai_intent',
  RasanluIntent = 'rasanlu_intent',
  SapcaiIntent = 'sapcai_intent',
  WatsonIntent = 'watson_intent',
  WitaiIntent = 'witai_intent',
  Crontab = 'crontab',
  Webhook = 'webhook',
  Always = 'always',
}

export const REGEX_MATCHING_CONDITIONS = ['match', 'search', 'fullmatch'] as const;
export const PARSE_MATCHING_CONDITIONS = ['match', 'search'] as const;

export type RegexMatchingCondition = (typeof REGEX_MATCHING_CONDITIONS)[number];
export type ParseMatchingCondition = (typeof PARSE_MATCHING_CONDITIONS)[number];

export interface EventTypeMatcher {
  kind: MatcherKind.EventType;
  eventType: string;
}

export interface RegexMatcher {
  kind: MatcherKind.Regex;
  expression: string;
  caseSensitive: boolean;
  matchingCondition: RegexMatchingCondition;
  scoreFactor: number;
}

export interface ParseFormatMatcher {
  kind: MatcherKind.ParseFormat;
  /** Format template such as `hello {name}`. */
  expression: string;
  caseSensitive: boolean;
  matchingCondition: ParseMatchingCondition;
  scoreFactor: number;
}

export type NluMatcherKind =
  | MatcherKind.DialogflowAction
  | MatcherKind.DialogflowIntent
  | MatcherKind.LuisaiIntent
  | MatcherKind.RasanluIntent
  | MatcherKind.SapcaiIntent
  | MatcherKind.WatsonIntent
  | MatcherKind.WitaiIntent;

/** Provider specific action or intent identifier. */
export interface NluMatcher<K extends NluMatcherKind = NluMatcherKind> {
  kind: K;
  value: string;
}

export interface CrontabMatcher {
  kind: MatcherKind.Crontab;
  crontab: string;
  /** IANA zone name; null means the scheduler's local zone. */
  timezone: string | null;
}

export interface WebhookMatcher {
  kind: MatcherKind.Webhook;
  webhook: string;
}

export interface AlwaysMatcher {
  kind: MatcherKind.Always;
  always: true;
}

export type MatcherDescriptor =
  | EventTypeMatcher
  | RegexMatcher
  | ParseFormatMatcher
  | NluMatcher
  | CrontabMatcher
  | WebhookMatcher
  | AlwaysMatcher;

const NLU_PROVIDER_LABELS: Record<NluMatcherKind, string> = {
  [MatcherKind.DialogflowAction]: 'dialogflow action',
  [MatcherKind.DialogflowIntent]: 'dialogflow intent',
  [MatcherKind.LuisaiIntent]: 'luis.ai intent',
  [MatcherKind.RasanluIntent]: 'rasa nlu intent',
  [MatcherKind.SapcaiIntent]: 'sap cai intent',
  [MatcherKind.WatsonIntent]: 'watson intent',
  [MatcherKind.WitaiIntent]: 'wit.ai intent',
};

/**
 * One-line description of a matcher, used in registry logs.
 */
export function describeMatcher(matcher: MatcherDescriptor): string {
  switch (matcher.kind) {
    case MatcherKind.EventType:
      return `event "${matcher.eventType}"`;
    case MatcherKind.Regex:
    case MatcherKind.ParseFormat: {
      const label = matcher.kind === MatcherKind.Regex ? 'regex' : 'parse';
      const flags = matcher.caseSensitive ? '' : ' (ignore case)';
      return `${label} ${matcher.matchingCondition} "${matcher.expression}"${flags} x${matcher.scoreFactor}`;
    }
    case MatcherKind.Crontab:
      return matcher.timezone
        ? `crontab "${matcher.crontab}" ${matcher.timezone}`
        : `crontab "${matcher.crontab}"`;
    case MatcherKind.Webhook:
      return `webhook "${matcher.webhook}"`;
    case MatcherKind.Always:
      return 'always';
    default:
      return `${NLU_PROVIDER_LABELS[matcher.kind]} "${matcher.value}"`;
  }
}
