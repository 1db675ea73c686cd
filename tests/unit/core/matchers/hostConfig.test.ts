import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

// A host app owns config/default.yaml and uses values this library does not know.
const HOST_CONFIG = ['app:', '  env: development', 'logger:', '  level: verbose', ''].join('\n');

describe('matchers inside a host app', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'skill-matchers-host-'));
    mkdirSync(join(dir, 'config'));
    writeFileSync(join(dir, 'config', 'default.yaml'), HOST_CONFIG);
    vi.spyOn(process, 'cwd').mockReturnValue(dir);
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.resetModules();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it('imports and decorates with the default score factor', async () => {
    const matchers = await import('../../../../src/core/matchers/index.js');

    const handler = matchers.matchRegex('hi')(async () => undefined);

    expect(matchers.getMatchers(handler)).toEqual([
      {
        kind: 'regex',
        expression: 'hi',
        caseSensitive: true,
        matchingCondition: 'match',
        scoreFactor: 0.6,
      },
    ]);
  });

  it('does not read the config file until settings are needed', async () => {
    const matchers = await import('../../../../src/core/matchers/index.js');
    const handler = matchers.matchWebhook('deploy')(async () => undefined);

    expect(matchers.getMatchers(handler)).toHaveLength(1);
    expect(console.warn).not.toHaveBeenCalled();

    expect(matchers.getMatcherSettings().scoreFactor).toBe(0.6);
    expect(console.warn).toHaveBeenCalledWith(
      expect.stringMatching(/^\[CONFIG\] Ignoring invalid "logger" section, using defaults/),
    );
  });
});
