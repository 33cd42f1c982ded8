/**
 * Configuration loader for the GA4 query tool
 *
 * Configuration is read once at startup from the environment and an optional
 * YAML or JSON file, then passed explicitly to the service and front ends.
 */

import * as fs from 'fs';
import * as yaml from 'yaml';
import { z } from 'zod';
import { OUTPUT_MODES, type OutputMode } from '../format/resultFormatter.js';
import { InvalidConfigError, MissingCredentialsError } from '../errors.js';
import { isLogLevel, logger, type LogLevel } from '../utils/logger.js';

const FileConfigSchema = z
  .object({
    propertyId: z.string().min(1).optional(),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    defaults: z
      .object({
        days: z.number().int().positive().default(30),
        limit: z.number().int().positive().default(10),
        output: z.enum(OUTPUT_MODES).default('table'),
      })
      .strict()
      .default({}),
    server: z
      .object({
        name: z.string().min(1).default('ga4-query-mcp'),
        version: z.string().min(1).default('1.0.0'),
      })
      .strict()
      .default({}),
  })
  .strict();

export type FileConfig = z.infer<typeof FileConfigSchema>;

export interface AppConfig {
  readonly credentialsPath?: string;
  readonly defaultPropertyId?: string;
  readonly logLevel: LogLevel;
  readonly defaults: {
    readonly days: number;
    readonly limit: number;
    readonly output: OutputMode;
  };
  readonly server: {
    readonly name: string;
    readonly version: string;
  };
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** Overrides GA4_CONFIG_PATH. */
  configPath?: string;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function readConfigFile(configPath: string): unknown {
  if (!fs.existsSync(configPath)) {
    logger.warn('Config file not found, using defaults', { configPath });
    return {};
  }

  const content = fs.readFileSync(configPath, 'utf-8');
  try {
    if (configPath.endsWith('.yaml') || configPath.endsWith('.yml')) {
      return yaml.parse(content) ?? {};
    }
    if (configPath.endsWith('.json')) {
      return JSON.parse(content);
    }
  } catch (error) {
    throw new InvalidConfigError(`Failed to parse config file ${configPath}: ${String(error)}`, {
      cause: error,
    });
  }

  throw new InvalidConfigError(
    `Unsupported config file type: ${configPath} (expected .yaml, .yml or .json)`
  );
}

export function parseFileConfig(raw: unknown, source = 'config'): FileConfig {
  const result = FileConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new InvalidConfigError(`Invalid ${source}: ${issues}`);
  }
  return result.data;
}

export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? nonEmpty(env.GA4_CONFIG_PATH);

  const fileConfig = parseFileConfig(
    configPath ? readConfigFile(configPath) : {},
    configPath ?? 'config'
  );

  const envLogLevel = nonEmpty(env.LOG_LEVEL);
  if (envLogLevel !== undefined && !isLogLevel(envLogLevel)) {
    throw new InvalidConfigError(
      `Invalid LOG_LEVEL "${envLogLevel}": expected debug, info, warn or error`
    );
  }

  const config: AppConfig = {
    credentialsPath: nonEmpty(env.GA4_CREDENTIALS_PATH),
    defaultPropertyId: nonEmpty(env.GA4_PROPERTY_ID) ?? fileConfig.propertyId,
    logLevel: envLogLevel ?? fileConfig.logLevel ?? 'info',
    defaults: { ...fileConfig.defaults },
    server: { ...fileConfig.server },
  };

  if (configPath) {
    logger.debug('App config loaded from file', { configPath });
  }

  return Object.freeze(config);
}

/**
 * Check that the service-account key file is configured and readable.
 * Reading and using the key is left to the Google client libraries.
 */
export function requireCredentials(config: AppConfig): string {
  const { credentialsPath } = config;
  if (!credentialsPath) {
    throw new MissingCredentialsError(
      'GA4_CREDENTIALS_PATH is not set. Point it at a service account JSON key.'
    );
  }

  try {
    fs.accessSync(credentialsPath, fs.constants.R_OK);
  } catch (error) {
    throw new MissingCredentialsError(
      `Credentials file is not readable: ${credentialsPath} (${String(error)})`
    );
  }

  return credentialsPath;
}
