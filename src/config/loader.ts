/**
 * Configuration loading.
 *
 * Reads an optional YAML file, validates it with Zod, fills defaults and
 * merges command-line overrides (the command line wins).
 */

import { readFile } from 'node:fs/promises';
import YAML from 'yaml';
import { z } from 'zod';

import type { LogLevelName, TracehoundConfig } from '../types/config.js';
import { ConfigError, errorMessage } from '../utils/errors.js';

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

export const ConfigFileSchema = z
  .object({
    analysis: z
      .object({
        min_requests: z.number().int().positive().default(50),
        top_ips: z.number().int().positive().default(10),
      })
      .default({}),
    output: z
      .object({
        formats: z.array(z.enum(['md', 'json', 'html'])).min(1).default(['md']),
        directory: z.string().min(1).default('.'),
      })
      .default({}),
    performance: z
      .object({
        concurrency: z.number().int().positive().default(4),
      })
      .default({}),
    logging: z
      .object({
        level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
      })
      .default({}),
  })
  .default({});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export const CONFIG_ENV_VAR = 'TRACEHOUND_CONFIG';

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function defaultConfig(): TracehoundConfig {
  return toConfig(ConfigFileSchema.parse({}));
}

/**
 * Parse and validate YAML configuration text.
 *
 * An empty document yields the defaults.
 */
export function parseConfig(text: string, source = 'config'): TracehoundConfig {
  let raw: unknown;
  try {
    raw = YAML.parse(text);
  } catch (err) {
    throw new ConfigError(`${source}: invalid YAML: ${errorMessage(err)}`, 'CONFIG_INVALID', {
      cause: err,
    });
  }

  const parsed = ConfigFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`${source}: ${issues}`, 'CONFIG_INVALID');
  }

  return toConfig(parsed.data);
}

/**
 * Load configuration from a YAML file, or the defaults when no path is given.
 */
export async function loadConfig(path?: string): Promise<TracehoundConfig> {
  if (!path) return defaultConfig();

  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Could not read config file ${path}: ${errorMessage(err)}`, 'CONFIG_READ_FAILED', {
      cause: err,
    });
  }

  return parseConfig(text, path);
}

/**
 * The config file to use: the explicit path, else `TRACEHOUND_CONFIG`.
 */
export function resolveConfigPath(
  explicit: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
): string | undefined {
  if (explicit) return explicit;
  const fromEnv = env[CONFIG_ENV_VAR];
  return fromEnv ? fromEnv : undefined;
}

export interface ConfigOverrides {
  minRequests?: number;
  topIps?: number;
  concurrency?: number;
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Apply command-line overrides. `quiet` takes precedence over `verbose`.
 */
export function mergeCliOptions(config: TracehoundConfig, overrides: ConfigOverrides): TracehoundConfig {
  let level: LogLevelName = config.logging.level;
  if (overrides.verbose) level = 'debug';
  if (overrides.quiet) level = 'error';

  return {
    analysis: {
      minRequests: overrides.minRequests ?? config.analysis.minRequests,
      topIps: overrides.topIps ?? config.analysis.topIps,
    },
    output: { ...config.output },
    performance: {
      concurrency: overrides.concurrency ?? config.performance.concurrency,
    },
    logging: { level },
  };
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function toConfig(file: ConfigFile): TracehoundConfig {
  return {
    analysis: {
      minRequests: file.analysis.min_requests,
      topIps: file.analysis.top_ips,
    },
    output: {
      formats: file.output.formats,
      directory: file.output.directory,
    },
    performance: {
      concurrency: file.performance.concurrency,
    },
    logging: {
      level: file.logging.level,
    },
  };
}
