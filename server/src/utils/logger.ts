import fs from 'fs';
import path from 'path';

type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LEVEL_ORDER: Record<LogLevel, number> = { DEBUG: 0, INFO: 1, WARN: 2, ERROR: 3 };

const LOG_DIR = process.env.LOG_DIR || path.join(process.cwd(), 'logs');
const LOG_FILE = path.join(LOG_DIR, 'storyloom.log');

function resolveLevel(value: string | undefined): LogLevel {
  const upper = (value || '').toUpperCase();
  return upper === 'INFO' || upper === 'WARN' || upper === 'ERROR' ? upper : 'DEBUG';
}

const MIN_LEVEL = resolveLevel(process.env.LOG_LEVEL);

let directoryReady = false;

function ensureLogDir(): void {
  if (directoryReady) return;
  if (!fs.existsSync(LOG_DIR)) {
    fs.mkdirSync(LOG_DIR, { recursive: true });
  }
  directoryReady = true;
}

function formatTimestamp(): string {
  return new Date().toISOString();
}

function serialize(data: unknown): string {
  if (typeof data === 'string') return data;
  if (data instanceof Error) return data.stack || `${data.name}: ${data.message}`;
  return JSON.stringify(data, null, 2);
}

function writeLog(level: LogLevel, category: string, message: string, data?: unknown): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[MIN_LEVEL]) return;

  const timestamp = formatTimestamp();
  let logLine = `[${timestamp}] [${level}] [${category}] ${message}`;

  if (data !== undefined) {
    try {
      logLine += `\n${serialize(data)}`;
    } catch {
      logLine += `\n[Unable to serialize data]`;
    }
  }

  logLine += '\n' + '='.repeat(80) + '\n';

  ensureLogDir();
  fs.appendFileSync(LOG_FILE, logLine);

  // Also write to console for immediate visibility
  if (level === 'ERROR') {
    console.error(logLine);
  } else if (level === 'WARN') {
    console.warn(logLine);
  }
}

export const logger = {
  debug: (category: string, message: string, data?: unknown) => writeLog('DEBUG', category, message, data),
  info: (category: string, message: string, data?: unknown) => writeLog('INFO', category, message, data),
  warn: (category: string, message: string, data?: unknown) => writeLog('WARN', category, message, data),
  error: (category: string, message: string, data?: unknown) => writeLog('ERROR', category, message, data),

  getLogPath: () => LOG_FILE,
};

export default logger;
