export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

/** Console-based logger with a `[Component]` prefix */
export function createLogger(component: string): Logger {
  const prefix = `[${component}]`;
  return {
    debug: (...args) => {
      if (process.env.LOG_LEVEL === 'debug') console.debug(prefix, ...args);
    },
    info: (...args) => console.log(prefix, ...args),
    warn: (...args) => console.warn(prefix, ...args),
    error: (...args) => console.error(prefix, ...args),
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
