import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { resolve, dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/** Longest delay a Node timer honours; anything above fires after 1 ms. */
export const MAX_CHECK_INTERVAL_SECONDS = 2_147_483;

export const PRIVACY_STATUSES = ['private', 'unlisted', 'public'] as const;
export type PrivacyStatus = (typeof PRIVACY_STATUSES)[number];

const watcherSchema = z.object({
  directory: z.string().min(1).default(join(homedir(), 'Videos')),
  checkIntervalSeconds: z.number().positive().max(MAX_CHECK_INTERVAL_SECONDS).default(300),
  include: z.array(z.string()).min(1).default(['*']),
});

const uploadSchema = z.object({
  enabled: z.boolean().default(true),
  tokenFile: z.string().min(1).default('token.json'),
  privacyStatus: z.enum(PRIVACY_STATUSES).default('private'),
  categoryId: z.string().default('22'),
  tags: z.array(z.string()).default([]),
  maxRetries: z.number().int().min(0).default(3),
});

const configSchema = z.object({
  watcher: watcherSchema.default({}),
  upload: uploadSchema.default({}),
});

export type WatcherConfig = z.infer<typeof watcherSchema>;
export type UploadConfig = z.infer<typeof uploadSchema>;
export type Config = z.infer<typeof configSchema>;

export interface ConfigOverrides {
  directory?: string;
  checkIntervalSeconds?: number;
  uploadEnabled?: boolean;
}

export interface LoadConfigOptions {
  configPath?: string;
  overrides?: ConfigOverrides;
  env?: NodeJS.ProcessEnv;
}

export class ConfigError extends Error {
  constructor(message: string, public readonly configPath: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function defaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.RECWATCH_CONFIG || resolve(__dirname, '../recwatch.config.json');
}

function readConfigFile(configPath: string): unknown {
  if (!existsSync(configPath)) {
    return {};
  }

  try {
    return JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(
      `Failed to read config from ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
      configPath,
    );
  }
}

function applyOverrides(config: Config, overrides: ConfigOverrides): Config {
  return {
    watcher: {
      ...config.watcher,
      ...(overrides.directory !== undefined && { directory: resolve(overrides.directory) }),
      ...(overrides.checkIntervalSeconds !== undefined && { checkIntervalSeconds: overrides.checkIntervalSeconds }),
    },
    upload: {
      ...config.upload,
      ...(overrides.uploadEnabled !== undefined && { enabled: overrides.uploadEnabled }),
    },
  };
}

/**
 * Loads defaults, then the JSON config file, then CLI overrides, and validates
 * the merged result. A missing file means defaults.
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const configPath = options.configPath ?? defaultConfigPath(options.env);
  const parsed = configSchema.safeParse(readConfigFile(configPath));

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config in ${configPath}: ${issues}`, configPath);
  }

  const merged = applyOverrides(parsed.data, options.overrides ?? {});

  const checked = configSchema.safeParse(merged);
  if (!checked.success) {
    throw new ConfigError(`Invalid overrides: ${checked.error.issues.map((i) => i.message).join('; ')}`, configPath);
  }

  return checked.data;
}
