import { readdirSync, statSync, type Stats } from 'fs';
import { isAbsolute, join, resolve } from 'path';
import { logger } from '../utils/logger.js';

// Checked in order, relative to the working directory
export const CONVENTIONAL_LOG_NAMES = [
  'proxy.log',
  'chaos_proxy.log',
  'proxy_logs.txt',
  'logs/proxy.log',
  'logs/chaos_proxy.log',
] as const;

export interface LocateOptions {
  logFile?: string;
  logDir: string;
  cwd?: string;
}

/**
 * Resolve the log file to analyze.
 *
 * Order: the explicit path if it exists, then the conventional names, then
 * the first `*.log` file in the log directory. Returns undefined when nothing
 * matches; that is a normal outcome, not an error.
 */
export function findLogFile(options: LocateOptions): string | undefined {
  const cwd = options.cwd ?? process.cwd();
  const at = (path: string) => (isAbsolute(path) ? path : resolve(cwd, path));

  if (options.logFile) {
    const explicit = at(options.logFile);
    if (isFile(explicit)) {
      return explicit;
    }
    logger.warn('Log file not found, falling back to search', { path: explicit });
  }

  for (const name of CONVENTIONAL_LOG_NAMES) {
    const candidate = at(name);
    if (isFile(candidate)) {
      return candidate;
    }
  }

  const logDir = at(options.logDir);
  if (!isDirectory(logDir)) {
    return undefined;
  }

  const entries = listLogFiles(logDir);
  for (const name of entries) {
    const candidate = join(logDir, name);
    if (isFile(candidate)) {
      return candidate;
    }
  }

  return undefined;
}

// readdir order is platform dependent; sorted so repeated runs pick the same file
function listLogFiles(dir: string): string[] {
  try {
    return readdirSync(dir).filter((name) => name.endsWith('.log')).sort();
  } catch (err) {
    logger.warn('Could not list log directory', { path: dir, error: String(err) });
    return [];
  }
}

// Any stat failure (ENOTDIR, EACCES, ...) means there is nothing usable at the path
function statOrUndefined(path: string): Stats | undefined {
  try {
    return statSync(path, { throwIfNoEntry: false });
  } catch (err) {
    logger.debug('Could not stat path', { path, error: String(err) });
    return undefined;
  }
}

function isFile(path: string): boolean {
  return statOrUndefined(path)?.isFile() ?? false;
}

function isDirectory(path: string): boolean {
  return statOrUndefined(path)?.isDirectory() ?? false;
}
