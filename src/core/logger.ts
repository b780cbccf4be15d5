import pino from 'pino';
import { existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';

function resolveLogDir(): string {
  return process.env.CAPFLOW_LOG_DIR || join(homedir(), '.capflow', 'logs');
}

function ensureLogDir(dir: string): void {
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

export function createLogger(name: string = 'capflow', verbose: boolean = false): pino.Logger {
  const level = process.env.CAPFLOW_LOG_LEVEL || 'info';

  if (verbose) {
    return pino({
      name,
      level: 'debug',
      transport: {
        target: 'pino-pretty',
        options: { colorize: true },
      },
    });
  }

  const logDir = resolveLogDir();
  ensureLogDir(logDir);

  return pino({
    name,
    level,
    transport: {
      target: 'pino/file',
      options: { destination: join(logDir, 'capflow.log'), mkdir: true },
    },
  });
}

let _logger: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (!_logger) {
    _logger = createLogger('capflow', process.env.CAPFLOW_LOG_PRETTY === '1');
  }
  return _logger;
}

export function setLogger(logger: pino.Logger): void {
  _logger = logger;
}

export function setLogLevel(level: pino.LevelWithSilent): void {
  getLogger().level = level;
}
