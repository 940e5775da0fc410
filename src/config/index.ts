import { z } from 'zod';
import fs from 'node:fs';
import path from 'node:path';
import { ConfigError, describeIssues } from '../types/errors.js';
import { DEFAULT_MAX_BODY_BYTES } from '../utils/body.js';

export const AutomationProfileSchema = z.object({
  /** Host the actions are sent to and the session is derived from. */
  host: z.string().trim().min(1).toLowerCase(),
  /** Regex over the request path; capture group 1 is the resource id. */
  actionPathPattern: z
    .string()
    .min(1)
    .refine(
      (p) => {
        try {
          new RegExp(p);
          return true;
        } catch {
          return false;
        }
      },
      { message: 'actionPathPattern is not a valid regular expression' },
    ),
  actionMethod: z.string().trim().min(1).toUpperCase().default('POST'),
  /** URL used for selected resources never seen in traffic; `{resourceId}` is substituted. */
  actionUrlTemplate: z.string().optional(),
  completeField: z.string().min(1).default('complete'),
  partField: z.string().min(1).default('part'),
  scopeField: z.string().min(1).default('scope_code'),
  extraHeaders: z.record(z.string(), z.string()).default({}),
  delaySeconds: z.number().nonnegative().default(1),
  timeoutMs: z.number().int().positive().default(10_000),
  scanLimit: z.number().int().positive().default(500),
});

export type AutomationProfile = z.infer<typeof AutomationProfileSchema>;

const ConfigSchema = z.object({
  database: z.object({
    path: z.string().min(1),
  }),
  capture: z.object({
    maxBodyBytes: z.number().int().positive().default(DEFAULT_MAX_BODY_BYTES),
  }),
  scope: z.object({
    hosts: z.array(z.string().trim().min(1).toLowerCase()).default([]),
  }),
  analyzer: z.object({
    slowThresholdSeconds: z.number().positive().default(1),
    largeResponseBytes: z.number().int().positive().default(DEFAULT_MAX_BODY_BYTES),
  }),
  replay: z.object({
    timeoutMs: z.number().int().positive().default(10_000),
  }),
  automation: AutomationProfileSchema.optional(),
  logging: z.object({
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    pretty: z.boolean().default(false),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

const FileConfigSchema = z.record(z.string(), z.unknown());

function section(file: Record<string, unknown>, key: string): Record<string, unknown> {
  const parsed = FileConfigSchema.safeParse(file[key]);
  return parsed.success ? parsed.data : {};
}

function splitList(value: string | undefined): string[] | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return value
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function numberFromEnv(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}

/**
 * Load configuration: environment defaults overlaid by the JSON config file.
 *
 * @param configPath  path relative to the working directory; a missing file is not an error
 * @param env         environment to read defaults from
 * @throws ConfigError when the file is not valid JSON or the merged result fails validation
 */
export function loadConfig(
  configPath = 'tapdeck.config.json',
  env: NodeJS.ProcessEnv = process.env,
): AppConfig {
  const full = path.resolve(process.cwd(), configPath);
  let fileRaw: Record<string, unknown> = {};
  if (fs.existsSync(full)) {
    try {
      const parsed = FileConfigSchema.safeParse(JSON.parse(fs.readFileSync(full, 'utf8')));
      if (!parsed.success) {
        throw new Error('top level must be an object');
      }
      fileRaw = parsed.data;
    } catch (e) {
      throw new ConfigError(
        `Failed to parse config file ${full}: ${e instanceof Error ? e.message : String(e)}`,
        { cause: e },
      );
    }
  }

  const scopeHosts = splitList(env['TAPDECK_SCOPE']);
  const merged = {
    database: {
      path: env['TAPDECK_DB_PATH'] || 'data/traffic.db',
      ...section(fileRaw, 'database'),
    },
    capture: {
      maxBodyBytes: numberFromEnv(env['TAPDECK_MAX_BODY_BYTES']),
      ...section(fileRaw, 'capture'),
    },
    scope: {
      ...(scopeHosts ? { hosts: scopeHosts } : {}),
      ...section(fileRaw, 'scope'),
    },
    analyzer: { ...section(fileRaw, 'analyzer') },
    replay: { ...section(fileRaw, 'replay') },
    automation: fileRaw['automation'],
    logging: {
      level: env['LOG_LEVEL'] || undefined,
      ...section(fileRaw, 'logging'),
    },
  };

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${describeIssues(result.error).join('; ')}`);
  }
  return result.data;
}

/** Configuration with every default applied and no file or environment read. */
export function defaultConfig(): AppConfig {
  return ConfigSchema.parse({
    database: { path: 'data/traffic.db' },
    capture: {},
    scope: {},
    analyzer: {},
    replay: {},
    logging: {},
  });
}
