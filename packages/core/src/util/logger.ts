/* ------------------------------------------------------------------
   Dependency-free logger with five verbosity levels.
   The sink is injected and called synchronously, one line per call.
   ------------------------------------------------------------------ */
export type Verbosity = 0 | 1 | 2 | 3 | 4;  // 0 = errors only … 4 = trace

export type LogSink = (msg: string) => void;

export interface Logger {
  level : Verbosity;
  log(lvl: Verbosity, msg: string): void;
  /** Same sink and level, every line tagged with `[scope]`. */
  scoped(scope: string): Logger;
}

export function isVerbosity(n: number): n is Verbosity {
  return Number.isInteger(n) && n >= 0 && n <= 4;
}

/** Clamp an arbitrary count (e.g. repeated `-v`) into the verbosity range. */
export function toVerbosity(n: number): Verbosity {
  const v = Math.max(0, Math.min(4, Math.trunc(n)));
  return isVerbosity(v) ? v : 0;
}

export function createLogger(
  level: Verbosity = 0,
  sink : LogSink = console.info,
  scope?: string,
): Logger {
  const tag = scope ? `[${scope}] ` : '';
  const logger: Logger = {
    level,
    log(lvl, msg) {
      if (lvl <= logger.level) sink(`${lvl}| ${tag}${msg}`);
    },
    scoped(inner) {
      const child = createLogger(logger.level, sink, scope ? `${scope}/${inner}` : inner);
      return child;
    },
  };
  return logger;
}
