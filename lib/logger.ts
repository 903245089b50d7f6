import 'server-only';
import fs from 'fs';
import path from 'path';
import pino from 'pino';

const TIMEZONE = 'America/Sao_Paulo';
const MAX_LOG_FILES = 10;
const nodeEnv = process.env.NODE_ENV;
const isDevelopment = nodeEnv === 'development';
const isTest = nodeEnv === 'test';

const cachedFormatter = new Intl.DateTimeFormat('pt-BR', {
  timeZone: TIMEZONE,
  year: 'numeric',
  month: '2-digit',
  day: '2-digit',
  hour: '2-digit',
  minute: '2-digit',
  second: '2-digit',
  hour12: false,
});

/**
 * Format a date in São Paulo time, either for log lines or for log file names
 */
function formatLocalDate(date: Date, format: 'filename' | 'log'): string {
  const parts = cachedFormatter.formatToParts(date);
  const get = (type: string): string => parts.find((p) => p.type === type)?.value ?? '';

  if (format === 'filename') {
    return `${get('year')}-${get('month')}-${get('day')}_${get('hour')}-${get('minute')}-${get('second')}`;
  }
  return `${get('year')}-${get('month')}-${get('day')} ${get('hour')}:${get('minute')}:${get('second')}`;
}

const localTimestamp = (): string => `,"time":"${formatLocalDate(new Date(), 'log')}"`;

/**
 * Keep only the newest non-empty log files
 */
function pruneLogs(logsDir: string): void {
  const files = fs
    .readdirSync(logsDir)
    .filter((f) => f.endsWith('.log'))
    .map((f) => {
      const filePath = path.join(logsDir, f);
      const stat = fs.statSync(filePath);
      return { path: filePath, mtime: stat.mtime.getTime(), size: stat.size };
    });

  for (const file of files.filter((f) => f.size === 0)) {
    fs.unlinkSync(file.path);
  }

  const stale = files
    .filter((f) => f.size > 0)
    .sort((a, b) => b.mtime - a.mtime)
    .slice(MAX_LOG_FILES);
  for (const file of stale) {
    fs.unlinkSync(file.path);
  }
}

/**
 * Log file for this process (development only), or null when logs/ is not writable
 */
function setupFileLogging(): string | null {
  if (!isDevelopment) {
    return null;
  }

  const logsDir = path.join(process.cwd(), 'logs');
  try {
    fs.mkdirSync(logsDir, { recursive: true });
    fs.accessSync(logsDir, fs.constants.W_OK);
  } catch {
    return null;
  }

  try {
    pruneLogs(logsDir);
  } catch (error) {
    // A failed cleanup leaves old files behind but must not block logging
    process.stderr.write(`log cleanup failed: ${String(error)}\n`);
  }

  return path.join(logsDir, `${formatLocalDate(new Date(), 'filename')}.log`);
}

function getTransport(logFilePath: string | null): pino.TransportMultiOptions | undefined {
  if (!isDevelopment) {
    return undefined;
  }

  const targets: pino.TransportTargetOptions[] = [
    {
      target: 'pino-pretty',
      options: {
        colorize: true,
        ignore: 'pid,hostname',
        // time is already formatted in São Paulo time
        translateTime: false,
      },
      level: 'debug',
    },
  ];

  if (logFilePath) {
    targets.push({
      target: 'pino-pretty',
      options: {
        colorize: false,
        ignore: 'pid,hostname',
        destination: logFilePath,
        mkdir: true,
        translateTime: false,
      },
      level: 'debug',
    });
  }

  return { targets };
}

function defaultLevel(): string {
  if (isTest) return 'silent';
  return isDevelopment ? 'debug' : 'info';
}

export const logger = pino({
  level: process.env.LOG_LEVEL ?? defaultLevel(),
  timestamp: localTimestamp,
  transport: getTransport(setupFileLogging()),
});

export default logger;
