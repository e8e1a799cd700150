export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogWriter = (level: LogLevel, line: string) => void;

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function formatLogArgs(args: unknown[]): string {
  return args
    .map(arg => {
      if (arg instanceof Error) {
        const stack = arg.stack ? ` | ${arg.stack}` : '';
        return `${arg.name}: ${arg.message}${stack}`;
      }
      if (typeof arg === 'string') return arg;
      if (typeof arg === 'number' || typeof arg === 'boolean') return String(arg);
      if (arg === null) return 'null';
      if (arg === undefined) return 'undefined';
      try {
        return JSON.stringify(arg);
      } catch {
        return '[Unserializable]';
      }
    })
    .join(' ');
}

export const consoleWriter: LogWriter = (level, line) => {
  const stamp = new Date().toISOString();
  if (level === 'error') console.error(`|${stamp}| ${line}`);
  else if (level === 'warn') console.warn(`|${stamp}| ${line}`);
  else console.log(`|${stamp}| ${line}`);
};

export function createLogger(
  scope: string,
  options: { level?: LogLevel; writer?: LogWriter } = {}
): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const writer = options.writer ?? consoleWriter;

  const emit =
    (level: LogLevel) =>
    (...args: unknown[]) => {
      if (LEVEL_ORDER[level] < threshold) return;
      writer(level, `${level.toUpperCase()} [${scope}] ${formatLogArgs(args)}`);
    };

  return {
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
  };
}

const noop = () => {};

export const noopLogger: Logger = { debug: noop, info: noop, warn: noop, error: noop };
