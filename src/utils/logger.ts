import { Logger, LogLevel } from '../types/index.js';
import { ENV_VARS } from '../constants/index.js';

const SEVERITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3
};

/**
 * Threshold picked from the environment: SHPP_VERBOSE=1 traces resolution,
 * NODE_ENV=development adds info, everything else only reports errors.
 */
export function logLevelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel {
  if (env[ENV_VARS.VERBOSE] === '1') {
    return LogLevel.DEBUG;
  }
  return env.NODE_ENV === 'development' ? LogLevel.INFO : LogLevel.ERROR;
}

function formatMeta(meta: unknown): string {
  if (meta === undefined) {
    return '';
  }
  if (meta instanceof Error) {
    return `\n${meta.stack ?? `${meta.name}: ${meta.message}`}`;
  }
  if (typeof meta === 'object' && meta !== null) {
    return ` ${JSON.stringify(meta)}`;
  }
  return ` ${String(meta)}`;
}

/**
 * Diagnostic logger. Lines go to stderr; the processed script only ever goes to the output file.
 */
export class ConsoleLogger implements Logger {
  constructor(
    readonly level: LogLevel,
    private readonly write: (line: string) => void = line => {
      process.stderr.write(`${line}\n`);
    }
  ) {}

  enabled(level: LogLevel): boolean {
    return SEVERITY[level] >= SEVERITY[this.level];
  }

  private log(level: LogLevel, message: string, meta?: unknown): void {
    if (this.enabled(level)) {
      this.write(`shpp ${level}: ${message}${formatMeta(meta)}`);
    }
  }

  debug(message: string, meta?: unknown): void {
    this.log(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.log(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.log(LogLevel.WARN, message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.log(LogLevel.ERROR, message, meta);
  }
}

export const logger = new ConsoleLogger(logLevelFromEnv());
