import { describe, expect, it } from 'vitest';
import { describeMatcher, MatcherKind } from '../../../../src/core/model/Matcher.js';

describe('describeMatcher', () => {
  it('describes text matchers', () => {
    expect(
      describeMatcher({
        kind: MatcherKind.Regex,
        expression: '^hi$',
        caseSensitive: true,
        matchingCondition: 'fullmatch',
        scoreFactor: 0.6,
      }),
    ).toBe('regex fullmatch "^hi$" x0.6');
    expect(
      describeMatcher({
        kind: MatcherKind.ParseFormat,
        expression: 'add {a} and {b}',
        caseSensitive: false,
        matchingCondition: 'search',
        scoreFactor: 1,
      }),
    ).toBe('parse search "add {a} and {b}" (ignore case) x1');
  });

  it('describes schedule and webhook matchers', () => {
    expect(describeMatcher({ kind: MatcherKind.Crontab, crontab: '0 2 * * *', timezone: null })).toBe(
      'crontab "0 2 * * *"',
    );
    expect(describeMatcher({ kind: MatcherKind.Crontab, crontab: '0 2 * * *', timezone: 'UTC' })).toBe(
      'crontab "0 2 * * *" UTC',
    );
    expect(describeMatcher({ kind: MatcherKind.Webhook, webhook: 'deploy' })).toBe('webhook "deploy"');
  });

  it('describes event, always and NLU matchers', () => {
    expect(describeMatcher({ kind: MatcherKind.EventType, eventType: 'typing' })).toBe('event "typing"');
    expect(describeMatcher({ kind: MatcherKind.Always, always: true })).toBe('always');
    expect(describeMatcher({ kind: MatcherKind.WitaiIntent, value: 'get_weather' })).toBe(
      'wit.ai intent "get_weather"',
    );
    expect(describeMatcher({ kind: MatcherKind.DialogflowAction, value: 'input.welcome' })).toBe(
      'dialogflow action "input.welcome"',
    );
  });
});
