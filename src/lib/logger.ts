import chalk from 'chalk';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LogSink {
  log(message: string): void;
  error(message: string): void;
}

const colors: Record<Exclude<LogLevel, 'silent'>, chalk.Chalk> = {
  debug: chalk.dim,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

function timestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Console logger printing `YYYY-MM-DD HH:mm:ss LEVEL: message`, dropping
 * everything below `level`.
 */
export function createLogger(
  level: LogLevel,
  sink: LogSink = console,
  now: () => Date = () => new Date()
): Logger {
  const threshold = LOG_LEVELS.indexOf(level);

  const write =
    (name: Exclude<LogLevel, 'silent'>) =>
    (message: string): void => {
      if (LOG_LEVELS.indexOf(name) < threshold) return;

      const line = `${timestamp(now())} ${colors[name](
        name.toUpperCase()
      )}: ${message}`;

      if (name === 'error' || name === 'warn') {
        sink.error(line);
      } else {
        sink.log(line);
      }
    };

  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
  };
}

export const silentLogger: Logger = createLogger('silent');
