export const isDev = () => process.env.NODE_ENV !== "production";

export const dlog = (...args: unknown[]) => {
  if (isDev()) console.log(...args);
};

export const dwarn = (...args: unknown[]) => {
  if (isDev()) console.warn(...args);
};

export const derr = (...args: unknown[]) => {
  if (isDev()) console.error(...args);
};

export type ScopedLogger = {
  log: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
};

/** Dev-only logger that prefixes every line with "[scope]", e.g. "[api/projection]". */
export function createLogger(scope: string): ScopedLogger {
  const prefix = `[${scope}]`;
  return {
    log: (...args) => dlog(prefix, ...args),
    warn: (...args) => dwarn(prefix, ...args),
    error: (...args) => derr(prefix, ...args),
  };
}
