/**
 * Configuration Resolution
 * Single-pass config resolution with explicit precedence
 * CLI flags > project config > user config > defaults
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { z } from 'zod';
import {
  EffectiveConfig,
  DEFAULT_CONFIG,
  ConfigSource,
  FovConfig,
  OutputFormat,
} from '../types/effective-config';
import { Logger } from '../types/logger';
import { getDefaultLogger } from '../logging/default-logger';
import { formatIssues } from '../schemas/validators';

export const PROJECT_CONFIG_FILE = '.mda-sequence.json';

/**
 * CLI flags that can override configuration
 */
export interface CliFlags {
  input?: string;
  format?: OutputFormat;
  fov?: FovConfig;
  axisOrder?: string;
  limit?: number;
  verbose?: boolean;
  debug?: boolean;
  jsonLogs?: boolean;
  noInteractive?: boolean;
  workingDirectory?: string;
}

const fileConfigSchema = z
  .object({
    format: z.enum(['summary', 'table', 'json']).optional(),
    fov: z.object({ width: z.number().positive(), height: z.number().positive() }).strict().optional(),
    axisOrder: z.string().optional(),
    limit: z.number().int().positive().optional(),
    interactive: z.boolean().optional(),
  })
  .strict();

/**
 * Project (./.mda-sequence.json) and user (~/.config/mda-sequence/config.json) config
 */
export type FileConfig = z.infer<typeof fileConfigSchema>;

export interface ResolveConfigOptions {
  /** Directory holding .config/mda-sequence (defaults to the home directory) */
  homeDirectory?: string;
  logger?: Logger;
}

/**
 * Load a config file if it exists. Unreadable or invalid files are
 * reported on the logger and otherwise ignored.
 */
export function loadConfigFile(path: string, logger: Logger): FileConfig | null {
  if (!existsSync(path)) {
    return null;
  }
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (e) {
    logger.warn(`Ignoring config file: ${e instanceof Error ? e.message : String(e)}`, { file: path });
    return null;
  }
  const result = fileConfigSchema.safeParse(data);
  if (!result.success) {
    logger.warn(`Ignoring invalid config file: ${formatIssues(result.error).join('; ')}`, { file: path });
    return null;
  }
  return result.data;
}

/**
 * Resolve configuration from all sources with explicit precedence
 * CLI flags > project config > user config > defaults
 */
export function resolveConfig(
  cliFlags: CliFlags,
  workingDirectory?: string,
  options: ResolveConfigOptions = {}
): EffectiveConfig {
  const logger = options.logger ?? getDefaultLogger();
  const cwd = workingDirectory ?? cliFlags.workingDirectory ?? process.cwd();
  const home = options.homeDirectory ?? homedir();

  const projectConfig = loadConfigFile(join(cwd, PROJECT_CONFIG_FILE), logger);
  const userConfig = loadConfigFile(join(home, '.config', 'mda-sequence', 'config.json'), logger);

  // Track sources for debugging
  const sources: Partial<Record<string, ConfigSource>> = {};

  function resolveValue<T>(
    key: string,
    cli: T | undefined,
    project: T | undefined,
    user: T | undefined,
    defaultVal: T
  ): T {
    if (cli !== undefined) {
      sources[key] = 'cli';
      return cli;
    }
    if (project !== undefined) {
      sources[key] = 'project';
      return project;
    }
    if (user !== undefined) {
      sources[key] = 'user';
      return user;
    }
    sources[key] = 'default';
    return defaultVal;
  }

  const config: EffectiveConfig = {
    schemaVersion: '1.0.0',
    input: cliFlags.input ?? '',
    axisOrder: resolveValue('axisOrder', cliFlags.axisOrder, projectConfig?.axisOrder, userConfig?.axisOrder, undefined),
    fov: resolveValue('fov', cliFlags.fov, projectConfig?.fov, userConfig?.fov, DEFAULT_CONFIG.fov),
    output: {
      format: resolveValue(
        'format',
        cliFlags.format,
        projectConfig?.format,
        userConfig?.format,
        DEFAULT_CONFIG.output.format
      ),
      limit: resolveValue('limit', cliFlags.limit, projectConfig?.limit, userConfig?.limit, undefined),
    },
    verbosity: {
      verbose: cliFlags.verbose ?? DEFAULT_CONFIG.verbosity.verbose,
      debug: cliFlags.debug ?? DEFAULT_CONFIG.verbosity.debug,
      jsonLogs: cliFlags.jsonLogs ?? DEFAULT_CONFIG.verbosity.jsonLogs,
    },
    interactivity: {
      interactive: resolveValue(
        'interactive',
        cliFlags.noInteractive ? false : undefined,
        projectConfig?.interactive,
        userConfig?.interactive,
        DEFAULT_CONFIG.interactivity.interactive
      ),
    },
    workingDirectory: cwd,
    sources,
  };

  logger.event('config_resolved', `Resolved configuration (format=${config.output.format})`, {
    sources: { ...sources },
  });

  return config;
}

/**
 * Parse a `WIDTHxHEIGHT` field of view, e.g. `512x512` or `0.5x0.25`
 */
export function parseFov(input: string): FovConfig | null {
  const match = /^\s*(\d+(?:\.\d+)?)\s*[xX]\s*(\d+(?:\.\d+)?)\s*$/.exec(input);
  if (!match) {
    return null;
  }
  const width = Number(match[1]);
  const height = Number(match[2]);
  if (width <= 0 || height <= 0) {
    return null;
  }
  return { width, height };
}
