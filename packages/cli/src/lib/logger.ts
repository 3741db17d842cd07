import { createConsola, type LogObject } from 'consola';
import fs from 'node:fs';
import path from 'node:path';
import { fieldlinkHome } from '../env.js';

/**
 * Central logger for the fieldlink CLI.
 *
 * A singleton backed by consola. Before `initLogger()` it writes to the
 * console at info level. After `initLogger()` it also appends NDJSON
 * entries to `<FIELDLINK_HOME>/logs/fieldlink.log`, rotating the file once
 * it grows past 10MB. The same instance is handed to the SDK as its logger.
 *
 * @module lib/logger
 */

const LOG_FILE_NAME = 'fieldlink.log';
const MAX_LOG_SIZE = 10 * 1024 * 1024; // 10MB
const MAX_LOG_FILES = 7;

function createFileReporter(logFile: string) {
  return {
    log(logObj: LogObject) {
      const entry = JSON.stringify({
        level: logObj.type,
        time: logObj.date.toISOString(),
        msg: logObj.args.map(String).join(' '),
        tag: logObj.tag || undefined,
      });
      fs.appendFileSync(logFile, entry + '\n');
    },
  };
}

/** Rotate the log file if >10MB and keep the newest MAX_LOG_FILES rotations. */
function rotateIfNeeded(logDir: string, logFile: string): void {
  let size: number;
  try {
    size = fs.statSync(logFile).size;
  } catch {
    // No log file yet
    return;
  }
  if (size <= MAX_LOG_SIZE) return;

  const date = new Date().toISOString().slice(0, 10);
  fs.renameSync(logFile, path.join(logDir, `fieldlink-${date}-${Date.now()}.log`));

  const rotated = fs
    .readdirSync(logDir)
    .filter((f) => f.startsWith('fieldlink-') && f.endsWith('.log'))
    .sort()
    .reverse();
  for (const old of rotated.slice(MAX_LOG_FILES)) {
    fs.unlinkSync(path.join(logDir, old));
  }
}

/** Console-only until initLogger is called. */
export let logger = createConsola({
  level: 3, // info
});

export interface InitLoggerOptions {
  /** Numeric consola level (0=fatal … 5=trace). Default: 3 */
  level?: number;
  /** Default: `<FIELDLINK_HOME>/logs` */
  logDir?: string;
}

/**
 * Reconfigure the logger with the resolved level and file persistence.
 *
 * @returns Path of the log file
 */
export function initLogger(options: InitLoggerOptions = {}): string {
  const logDir = options.logDir ?? path.join(fieldlinkHome(), 'logs');
  const logFile = path.join(logDir, LOG_FILE_NAME);
  fs.mkdirSync(logDir, { recursive: true });
  try {
    rotateIfNeeded(logDir, logFile);
  } catch (err) {
    logger.warn(`Log rotation failed: ${err instanceof Error ? err.message : String(err)}`);
  }

  logger = createConsola({ level: options.level ?? 3 });
  logger.addReporter(createFileReporter(logFile));
  return logFile;
}
