import { setLogLevel } from '../utils/logger.js';
import { startServer } from '../server/index.js';

interface ServeOptions {
  port: string;
  logFile?: string;
  logDir: string;
  debug?: boolean;
}

export async function serveCommand(options: ServeOptions): Promise<void> {
  if (options.debug) {
    setLogLevel('debug');
  }

  await startServer({
    port: parseInt(options.port, 10),
    logFile: options.logFile,
    logDir: options.logDir,
  });
}
