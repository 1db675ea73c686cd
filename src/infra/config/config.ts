import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse } from 'yaml';
import { z } from 'zod';

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

/** Default weight given to regex and parse-format matches. */
export const REGEX_PARSE_SCORE_FACTOR = 0.6;

const LevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const SectionSchemas = {
  app: z.object({
    name: z.string().optional(),
    env: z.enum(['dev', 'prod', 'test']).optional(),
  }),
  logger: z.object({
    level: LevelSchema.optional(),
    transport: z.literal('console').optional(),
  }),
  logging: z.object({
    color: z.boolean().optional(),
    level: LevelSchema.optional(),
  }),
  matchers: z.object({
    scoreFactor: z.number().finite().nonnegative().optional(),
    deprecationWarnings: z.boolean().optional(),
  }),
};

type SectionName = keyof typeof SectionSchemas;

export type AppConfig = {
  [K in SectionName]?: z.infer<(typeof SectionSchemas)[K]>;
};

export type AppConfigRequired = {
  app: {
    name: string;
    env: 'dev' | 'prod' | 'test';
  };
  logger: {
    level: LogLevelName;
    transport: 'console';
  };
  logging: {
    color: boolean;
    level: LogLevelName;
  };
  matchers: {
    scoreFactor: number;
    deprecationWarnings: boolean;
  };
};

const EnvSchema = z.enum(['dev', 'prod', 'test']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate one section. A section that does not fit is dropped with a warning
 * so its defaults apply; the host app may share the file for its own keys.
 */
function readSection<T extends z.ZodTypeAny>(
  raw: Record<string, unknown>,
  name: SectionName,
  schema: T,
): z.infer<T> | undefined {
  if (raw[name] === undefined || raw[name] === null) return undefined;
  const result = schema.safeParse(raw[name]);
  if (result.success) return result.data;

  const issues = result.error.issues
    .map((issue) => `${[name, ...issue.path].join('.')}: ${issue.message}`)
    .join('; ');
  console.warn(`[CONFIG] Ignoring invalid "${name}" section, using defaults (${issues})`);
  return undefined;
}

/**
 * Fill every optional key with its default. Exposed separately from
 * {@link loadConfig} so callers holding an already parsed document can reuse it.
 */
export function resolveConfig(raw: unknown, nodeEnv?: string): AppConfigRequired {
  const doc = isRecord(raw) ? raw : {};
  if (raw !== null && raw !== undefined && !isRecord(raw)) {
    console.warn('[CONFIG] Config document is not a mapping, using defaults');
  }
  const cfg: AppConfig = {
    app: readSection(doc, 'app', SectionSchemas.app),
    logger: readSection(doc, 'logger', SectionSchemas.logger),
    logging: readSection(doc, 'logging', SectionSchemas.logging),
    matchers: readSection(doc, 'matchers', SectionSchemas.matchers),
  };
  const envFromProcess = EnvSchema.safeParse(nodeEnv);
  const env = envFromProcess.success ? envFromProcess.data : (cfg.app?.env ?? 'prod');

  return {
    app: {
      name: cfg.app?.name ?? 'skill-matchers',
      env,
    },
    logger: {
      level: cfg.logger?.level ?? 'info',
      transport: 'console',
    },
    logging: {
      color: cfg.logging?.color ?? true,
      level: cfg.logging?.level ?? cfg.logger?.level ?? 'info',
    },
    matchers: {
      scoreFactor: cfg.matchers?.scoreFactor ?? REGEX_PARSE_SCORE_FACTOR,
      deprecationWarnings: cfg.matchers?.deprecationWarnings ?? true,
    },
  };
}

let cachedConfig: AppConfigRequired | null = null;

/**
 * Read `config/default.yaml` under the working directory on first call and
 * cache the result. Nothing reads the file at import time.
 */
export function loadConfig(): AppConfigRequired {
  if (cachedConfig) return cachedConfig;
  const filePath = resolve(process.cwd(), 'config', 'default.yaml');
  // No config file is fine: a skill library is usually loaded inside someone else's app.
  const raw: unknown = existsSync(filePath) ? parse(readFileSync(filePath, 'utf-8')) : {};
  cachedConfig = resolveConfig(raw, process.env.NODE_ENV);
  return cachedConfig;
}
