import pino from 'pino';
import { existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';

const LOG_DIR = join(homedir(), '.lats', 'logs');

function ensureLogDir(): void {
  if (!existsSync(LOG_DIR)) {
    mkdirSync(LOG_DIR, { recursive: true });
  }
}

function resolveLevel(): string {
  return process.env.LATS_LOG_LEVEL || 'info';
}

export function createLogger(name: string = 'lats', verbose: boolean = false): pino.Logger {
  if (verbose) {
    return pino({
      name,
      level: process.env.LATS_LOG_LEVEL || 'debug',
      transport: {
        target: 'pino-pretty',
        options: { colorize: true },
      },
    });
  }

  ensureLogDir();
  return pino({
    name,
    level: resolveLevel(),
    transport: {
      target: 'pino/file',
      options: { destination: join(LOG_DIR, 'lats.log'), mkdir: true },
    },
  });
}

let _logger: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (!_logger) {
    _logger = createLogger();
  }
  return _logger;
}

export function setLogger(logger: pino.Logger): void {
  _logger = logger;
}
