import path from 'node:path';
import fs from 'node:fs';
import util from 'node:util';
import { setLogger } from './ctx.js';

export type LogLevelName = 'silent' | 'error' | 'info' | 'debug';

export type Logger = {
  levelName: LogLevelName;
  filePath: string;
  error: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
};

export type LoggerOptions = {
  level: LogLevelName | 'auto';
  logDir: string;
  /** Mirror every written line to stdout/stderr. */
  echo: boolean;
};

const LEVELS: Record<LogLevelName, number> = { silent: 0, error: 1, info: 2, debug: 3 };

let consolePatched = false;

export function resolveLogLevel(configured: LogLevelName | 'auto'): LogLevelName {
  if (configured !== 'auto') return configured;
  return process.env.NODE_ENV === 'development' ? 'debug' : 'info';
}

export function formatArg(arg: unknown): string {
  if (typeof arg === 'string') return arg;
  if (arg instanceof Error) return arg.stack || arg.message || String(arg);
  return util.inspect(arg, { depth: 4, breakLength: 120, compact: true });
}

export function formatLine(lvl: string, args: unknown[], now = new Date()): string {
  return `[${now.toISOString()}] [${lvl}] ${args.map(formatArg).join(' ')}`;
}

export function createLogger(options: LoggerOptions): Logger {
  const levelName = resolveLogLevel(options.level);
  const level = LEVELS[levelName];
  fs.mkdirSync(options.logDir, { recursive: true });
  const filePath = path.join(options.logDir, 'app.log');
  let fileWritable = true;

  const writeLine = (msg: string) => {
    if (!fileWritable) return;
    try {
      fs.appendFileSync(filePath, msg + '\n');
    } catch (err) {
      fileWritable = false;
      process.stderr.write(`[log] cannot write ${filePath}, file logging disabled: ${formatArg(err)}\n`);
    }
  };

  const emit = (lvl: 'ERROR' | 'INFO' | 'DEBUG', threshold: number, stream: NodeJS.WriteStream, args: unknown[]) => {
    if (level < threshold) return;
    const line = formatLine(lvl, args);
    writeLine(line);
    if (options.echo) stream.write(line + '\n');
  };

  return {
    levelName,
    filePath,
    error: (...args) => emit('ERROR', LEVELS.error, process.stderr, args),
    info: (...args) => emit('INFO', LEVELS.info, process.stdout, args),
    debug: (...args) => emit('DEBUG', LEVELS.debug, process.stdout, args)
  };
}

/**
 * Patches console.log/warn/error/debug to route through the logger and registers it
 * in ctx so all modules get the same logger instance via the live binding.
 */
export function installConsoleLogger(loggerInstance: Logger): void {
  if (consolePatched) return;
  consolePatched = true;
  setLogger(loggerInstance);
  console.log = (...args: unknown[]) => loggerInstance.info(...args);
  console.info = (...args: unknown[]) => loggerInstance.info(...args);
  console.debug = (...args: unknown[]) => loggerInstance.debug(...args);
  console.warn = (...args: unknown[]) => loggerInstance.error(...args);
  console.error = (...args: unknown[]) => loggerInstance.error(...args);
  loggerInstance.debug('[log] console patched', { file: loggerInstance.filePath, level: loggerInstance.levelName });
}
