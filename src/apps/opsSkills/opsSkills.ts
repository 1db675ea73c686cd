import {
  matchAlways,
  matchCrontab,
  matchEvent,
  matchParse,
  matchRasanlu,
  matchRegex,
  matchWebhook,
  withMatchers,
} from '../../core/matchers/index.js';

/**
 * Sample skill module: deployment helpers for an ops chat room.
 * Handlers only return the text they would reply with.
 */

export const deploy = withMatchers(
  async (target: string) => `Deploying ${target}...`,
  matchRegex('deploy (?<target>\\w+)', { caseSensitive: false }),
  matchWebhook('deploy'),
);

export const nightlyReport = withMatchers(
  async () => 'Nightly report is ready',
  matchCrontab('0 2 * * *', 'Europe/Berlin'),
);

export const remind = withMatchers(
  async (task: string, time: string) => `I will remind you to ${task} at ${time}`,
  matchParse('remind me to {task} at {time}', { matchingCondition: 'search' }),
  matchRasanlu('set_reminder'),
);

export const greetNewcomer = matchEvent('join')(async (name: string) => `Welcome, ${name}!`);

export const audit = matchAlways(async (text: string) => text.length);

// Not a skill: no matchers
export function formatDuration(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}
