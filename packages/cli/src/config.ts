/**
 * CLI configuration
 *
 * Environment variables, validated with zod. Command-line flags take
 * precedence over the environment.
 */

import { z, type ZodError } from 'zod';
import type { CLIOptions } from './types.js';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const ParseModeSchema = z.enum(['fail-fast', 'collect']);

const EnvSchema = z.object({
  WGPEERS_LOG_LEVEL: z.enum(LOG_LEVELS).default('warn'),
  WGPEERS_PARSE_MODE: ParseModeSchema.default('fail-fast'),
});

export type CliConfig = {
  logLevel: LogLevel;
  mode: z.infer<typeof ParseModeSchema>;
};

/**
 * Invalid environment variable or flag value
 */
export class ConfigError extends Error {
  readonly code = 'E_INVALID_CONFIG';

  constructor(
    message: string,
    public readonly issues: ZodError['issues']
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

function formatIssues(error: ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || 'value'}: ${i.message}`).join('; ');
}

/**
 * Read configuration from the environment
 *
 * @throws ConfigError on an unknown log level or parse mode
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(result.error)}`, result.error.issues);
  }
  return {
    logLevel: result.data.WGPEERS_LOG_LEVEL,
    mode: result.data.WGPEERS_PARSE_MODE,
  };
}

/**
 * Global flags as commander reports them
 */
export type GlobalFlags = {
  json?: boolean;
  verbose?: boolean;
  mode?: string;
};

/**
 * Merge flags over configuration
 *
 * @throws ConfigError on an unknown --mode value
 */
export function resolveOptions(config: CliConfig, flags: GlobalFlags): CLIOptions {
  let mode = config.mode;
  if (flags.mode !== undefined) {
    const parsed = ParseModeSchema.safeParse(flags.mode);
    if (!parsed.success) {
      throw new ConfigError(`Invalid --mode: ${formatIssues(parsed.error)}`, parsed.error.issues);
    }
    mode = parsed.data;
  }

  return {
    json: flags.json ?? false,
    mode,
    logLevel: flags.verbose ? 'debug' : config.logLevel,
  };
}
