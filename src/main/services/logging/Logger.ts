import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LoggerOptions {
  fileName?: string;
  maxBytes?: number;
  /** Rotated files kept beside the active one (`.1` is the most recent). */
  maxFiles?: number;
  minLevel?: LogLevel;
  mirrorFilePath?: string | null;
}

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

const DEFAULT_MAX_BYTES = 2 * 1024 * 1024;
const DEFAULT_MAX_FILES = 1;

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

/**
 * Append-only JSON lines under `<baseDir>/logs`. Every operation of the updater reports through
 * here with a dotted event key (`plugin.fetch.start`) and a structured meta object.
 */
export class Logger {
  private readonly filePath: string;
  private readonly mirrorFilePath: string | null;
  private readonly maxBytes: number;
  private readonly maxFiles: number;
  private readonly minWeight: number;

  constructor(baseDir: string, options: LoggerOptions = {}) {
    const logDir = path.join(baseDir, 'logs');
    fs.mkdirSync(logDir, { recursive: true });
    this.filePath = path.join(logDir, options.fileName ?? 'plugin-updater.log');
    this.maxBytes = positiveInteger(options.maxBytes, DEFAULT_MAX_BYTES);
    this.maxFiles = positiveInteger(options.maxFiles, DEFAULT_MAX_FILES);
    this.minWeight = LEVEL_WEIGHT[options.minLevel ?? 'debug'];
    this.mirrorFilePath = options.mirrorFilePath?.trim() || null;
    if (this.mirrorFilePath) {
      fs.mkdirSync(path.dirname(this.mirrorFilePath), { recursive: true });
    }
  }

  debug(message: string, meta?: unknown): void {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.write('warn', message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.write('error', message, meta);
  }

  private write(level: LogLevel, message: string, meta?: unknown): void {
    if (LEVEL_WEIGHT[level] < this.minWeight) {
      return;
    }

    const line = `${JSON.stringify({ ts: new Date().toISOString(), level, message, meta })}\n`;
    this.rotateIfNeeded();
    fs.appendFileSync(this.filePath, line);
    if (this.mirrorFilePath) {
      try {
        fs.appendFileSync(this.mirrorFilePath, line);
      } catch {
        // mirror is best effort; the primary file already has the line
      }
    }
  }

  private rotateIfNeeded(): void {
    if (!fs.existsSync(this.filePath) || fs.statSync(this.filePath).size < this.maxBytes) {
      return;
    }

    const rotated = this.rotatedPaths();
    for (let index = rotated.length - 1; index > 0; index -= 1) {
      const newer = rotated[index - 1];
      const older = rotated[index];
      if (newer && older && fs.existsSync(newer)) {
        fs.renameSync(newer, older);
      }
    }

    const first = rotated[0];
    if (first) {
      fs.rmSync(first, { force: true });
      fs.renameSync(this.filePath, first);
    }
  }

  private rotatedPaths(): string[] {
    return Array.from({ length: this.maxFiles }, (_, index) => `${this.filePath}.${index + 1}`);
  }
}

export function parseLogLevel(value: string | null | undefined): LogLevel | null {
  const parsed = logLevelSchema.safeParse(value?.trim().toLowerCase());
  return parsed.success ? parsed.data : null;
}

function positiveInteger(value: number | undefined, fallback: number): number {
  if (value === undefined || !Number.isFinite(value) || value <= 0) {
    return fallback;
  }

  return Math.max(1, Math.trunc(value));
}
