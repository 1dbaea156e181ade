/**
 * Console logging with a [Component] prefix.
 * Set DEBUG_CANARY=true to enable debug lines.
 */

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export function isDebugEnabled(): boolean {
  return process.env.DEBUG_CANARY === "true";
}

export function createLogger(component: string): Logger {
  const prefix = `[${component}]`;
  return {
    debug(...args) {
      if (isDebugEnabled()) console.log(prefix, ...args);
    },
    info(...args) {
      console.log(prefix, ...args);
    },
    warn(...args) {
      console.warn(prefix, ...args);
    },
    error(...args) {
      console.error(prefix, ...args);
    },
  };
}
