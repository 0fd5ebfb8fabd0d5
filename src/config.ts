import fs from 'node:fs';
import { ConfigurationError, ErrorCode } from './errors.js';
import { isLogLevel, type LogLevel } from './logger.js';

/** Settings read from the environment. Explicit options always win over these. */
export interface EnvConfig {
  /** `PAGEPRESS_CHROME_PATH` */
  chromePath?: string;
  /** `PAGEPRESS_LOG_LEVEL`, default `warn` */
  logLevel: LogLevel;
  /** `PAGEPRESS_TEMP_DIR` */
  tempDirectory?: string;
  /** `PAGEPRESS_CONVERSION_TIMEOUT_MS` */
  conversionTimeoutMs?: number;
  /** `PAGEPRESS_NO_SANDBOX` */
  noSandbox: boolean;
}

export function parsePositiveInt(value: string, name: string): number {
  const trimmed = value.trim();
  const parsed = Number(trimmed);
  if (!/^\d+$/.test(trimmed) || !Number.isSafeInteger(parsed) || parsed < 1) {
    throw new ConfigurationError(ErrorCode.INVALID_ARGUMENT, `${name} has to be a positive integer, got '${value}'`);
  }
  return parsed;
}

export function assertDirectoryExists(dir: string, what: string): void {
  let isDirectory = false;
  try {
    isDirectory = fs.statSync(dir).isDirectory();
  } catch (err) {
    throw new ConfigurationError(ErrorCode.DIRECTORY_NOT_FOUND, `The ${what} '${dir}' does not exist`, { dir, cause: String(err) });
  }
  if (!isDirectory) {
    throw new ConfigurationError(ErrorCode.DIRECTORY_NOT_FOUND, `The ${what} '${dir}' is not a directory`, { dir });
  }
}

function parseBoolean(value: string, name: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0' || normalized === '') return false;
  throw new ConfigurationError(ErrorCode.INVALID_ARGUMENT, `${name} has to be 'true' or 'false', got '${value}'`);
}

/**
 * Reads `PAGEPRESS_*` variables. Every invalid value is collected and
 * reported in one `ConfigurationError`.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const problems: string[] = [];
  const config: EnvConfig = { logLevel: 'warn', noSandbox: false };

  const chromePath = env.PAGEPRESS_CHROME_PATH?.trim();
  if (chromePath) config.chromePath = chromePath;

  const logLevel = env.PAGEPRESS_LOG_LEVEL?.trim();
  if (logLevel) {
    if (isLogLevel(logLevel)) config.logLevel = logLevel;
    else problems.push(`PAGEPRESS_LOG_LEVEL has to be one of error, warn, info, debug, got '${logLevel}'`);
  }

  const tempDirectory = env.PAGEPRESS_TEMP_DIR?.trim();
  if (tempDirectory) config.tempDirectory = tempDirectory;

  const timeout = env.PAGEPRESS_CONVERSION_TIMEOUT_MS;
  if (timeout !== undefined && timeout.trim() !== '') {
    try {
      config.conversionTimeoutMs = parsePositiveInt(timeout, 'PAGEPRESS_CONVERSION_TIMEOUT_MS');
    } catch (err) {
      problems.push(err instanceof Error ? err.message : String(err));
    }
  }

  const noSandbox = env.PAGEPRESS_NO_SANDBOX;
  if (noSandbox !== undefined) {
    try {
      config.noSandbox = parseBoolean(noSandbox, 'PAGEPRESS_NO_SANDBOX');
    } catch (err) {
      problems.push(err instanceof Error ? err.message : String(err));
    }
  }

  if (problems.length) {
    throw new ConfigurationError(ErrorCode.INVALID_ARGUMENT, `Invalid environment: ${problems.join('; ')}`, { problems });
  }
  return config;
}
