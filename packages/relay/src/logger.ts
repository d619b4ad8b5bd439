// Logger - Console logger shared by relay components

export interface Logger {
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  debug(...args: unknown[]): void;
}

export function createConsoleLogger(): Logger {
  return {
    info: (...args) => console.log(new Date().toISOString(), '[INFO]', ...args),
    warn: (...args) => console.warn(new Date().toISOString(), '[WARN]', ...args),
    error: (...args) => console.error(new Date().toISOString(), '[ERROR]', ...args),
    debug: (...args) => {
      if (process.env.DEBUG) console.log(new Date().toISOString(), '[DEBUG]', ...args);
    },
  };
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};
