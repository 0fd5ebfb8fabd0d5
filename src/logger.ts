import winston from 'winston';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

const lineFormat = winston.format.printf((info) => {
  const { timestamp, level, message, instanceId, ...meta } = info;
  const scope = typeof instanceId === 'string' ? ` [${instanceId}]` : '';
  const rest = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
  return `${String(timestamp)} [${level}]${scope} ${String(message)}${rest}`;
});

/**
 * Creates the logger every converter writes through.
 *
 * All levels go to stderr so the CLI can stream PDF bytes on stdout.
 */
export function createLogger(opts: { level?: LogLevel; instanceId?: string; silent?: boolean } = {}): winston.Logger {
  return winston.createLogger({
    level: opts.level ?? 'warn',
    silent: opts.silent ?? false,
    defaultMeta: opts.instanceId ? { instanceId: opts.instanceId } : undefined,
    format: winston.format.combine(
      winston.format.timestamp(),
      lineFormat,
    ),
    transports: [
      new winston.transports.Console({ stderrLevels: [...LOG_LEVELS] }),
    ],
  });
}
