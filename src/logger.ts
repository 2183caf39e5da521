export function log(...args: unknown[]) {
  console.log(new Date().toISOString(), ...args);
}

export function logWarn(...args: unknown[]) {
  console.warn(new Date().toISOString(), ...args);
}

export function logError(...args: unknown[]) {
  console.error(new Date().toISOString(), ...args);
}

export function logEvent(event: string, payload?: Record<string, unknown>) {
  const suffix = payload ? JSON.stringify(payload) : "";
  console.log(new Date().toISOString(), `[event:${event}]`, suffix);
}

/** Prefixed loggers for modules that tag their own lines. */
export function scopedLogger(scope: string) {
  return {
    log: (...args: unknown[]) => log(`[${scope}]`, ...args),
    warn: (...args: unknown[]) => logWarn(`[${scope}]`, ...args),
    error: (...args: unknown[]) => logError(`[${scope}]`, ...args),
  };
}
