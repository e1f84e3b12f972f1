export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type Logger = (...args: unknown[]) => void;

export const createLogger = (name: string, logLevel: LogLevel = 'info'): Logger => {
  return (...args: unknown[]) => {
    console[logLevel](new Date().toLocaleString(), `[${name}]`, ...args);
  };
};

export const noopLogger: Logger = () => {};

// Free-form argument strings are passed through as-is: no quoting, no escapes
export const splitArguments = (s: string | undefined) =>
  (s ?? '').split(/\s+/).filter(Boolean);
