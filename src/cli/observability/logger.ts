/**
 * Check Log Files
 *
 * Role:
 *   One log file per executed check, written after the check finishes.
 *
 * Guarantees:
 *   - One log file per check, named after a filesystem-safe form of the check name
 *   - Distinct check names never share a log file
 *   - Ordered, complete output (stdout, then stderr)
 *   - Raw format writes the captured text without line prefixes
 *   - Text and JSON formats normalize output line by line
 *
 * Non-goals:
 *   - No live streaming while the check runs
 */

import { createHash } from 'node:crypto';
import { createWriteStream } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import path from 'node:path';
import { Readable, Transform } from 'node:stream';
import { pipeline } from 'node:stream/promises';

import type { LogFormat } from '../modules/types.ts';

interface StructuredPayload {
  timestamp: string;
  check: string;
  message: string;
}

export interface LogOptions {
  readonly logDir: string;
  readonly checkName: string;
  readonly format: LogFormat;
  /** Maximum bytes to write; logs beyond this are truncated deterministically. */
  readonly maxBytes?: number;
}

/**
 * Build `LogOptions` with optional fields in a type-safe manner.
 */
export function makeLogOptions(opts: {
  logDir: string;
  checkName: string;
  format?: LogFormat;
  maxBytes?: number;
}): LogOptions {
  const { logDir, checkName, format, maxBytes } = opts;

  return {
    logDir,
    checkName,
    format: format ?? 'text',
    ...(maxBytes === undefined ? {} : { maxBytes }),
  };
}

/* -------------------------------------------------------------------------- */
/* Helpers                                                                    */
/* -------------------------------------------------------------------------- */

const MAX_FILE_STEM_LENGTH = 100;
const NAME_HASH_LENGTH = 8;

/**
 * Map a check name (which may be an arbitrary shell command) to a file stem.
 *
 * Names that are already safe are used as-is. Any other name gets a short
 * hash of the original appended, so `npm test` and `npm_test` stay apart.
 */
export function logFileStem(checkName: string): string {
  const sanitized = checkName.replaceAll(/[^A-Za-z0-9._-]+/g, '_');
  const reserved = (stem: string): boolean => stem === '' || stem === '.' || stem === '..';

  if (sanitized === checkName && !reserved(sanitized) && sanitized.length <= MAX_FILE_STEM_LENGTH) {
    return sanitized;
  }

  const hash = createHash('sha256').update(checkName).digest('hex').slice(0, NAME_HASH_LENGTH);
  const prefix = sanitized.slice(0, MAX_FILE_STEM_LENGTH - NAME_HASH_LENGTH - 1);
  return `${reserved(prefix) ? '_' : prefix}-${hash}`;
}

/**
 * Determine the log path for a check under the configured log dir.
 */
export function getLogPath(logDir: string, checkName: string): string {
  return path.join(logDir, `${logFileStem(checkName)}.log`);
}

async function ensureLogDirectory(logDir: string): Promise<void> {
  await mkdir(logDir, { recursive: true });
}

/* -------------------------------------------------------------------------- */
/* Line-safe transforms                                                       */
/* -------------------------------------------------------------------------- */

type LineProcessor = (line: string) => string;

/**
 * Build a transform stream that buffers chunks until line boundaries appear.
 */
function createBufferingTransform(processLine: LineProcessor): Transform {
  let buffer = '';

  return new Transform({
    transform(chunk: Buffer | string, _enc, cb): void {
      buffer += typeof chunk === 'string' ? chunk : chunk.toString('utf8');

      for (;;) {
        const newlineIndex = buffer.indexOf('\n');
        if (newlineIndex < 0) {
          break;
        }

        const line = buffer.slice(0, newlineIndex);
        buffer = buffer.slice(newlineIndex + 1);
        this.push(`${processLine(line)}\n`);
      }

      cb();
    },

    flush(cb): void {
      if (buffer.length > 0) {
        this.push(`${processLine(buffer)}\n`);
      }
      cb();
    },
  });
}

/**
 * Transform that prefixes each line with a timestamp and the check name.
 */
function createNormalizingTransform(checkName: string): Transform {
  return createBufferingTransform((line) => {
    const timestamp = new Date().toISOString();
    const suffix = line.length === 0 ? '' : ` ${line}`;
    return `[${timestamp}] [${checkName}]${suffix}`;
  });
}

/**
 * Transform that emits one JSON payload per line.
 */
function createStructuredTransform(checkName: string): Transform {
  return createBufferingTransform((line) => {
    const payload: StructuredPayload = {
      timestamp: new Date().toISOString(),
      check: checkName,
      message: line,
    };
    return JSON.stringify(payload);
  });
}

/**
 * Create a transform that truncates output after a certain byte budget.
 */
function createBoundedTransform(
  checkName: string,
  structured: boolean,
  maxBytes?: number,
): Transform {
  if (maxBytes === undefined) {
    return new Transform({
      transform(chunk, _enc, cb) {
        this.push(chunk);
        cb();
      },
    });
  }

  let remaining = Math.max(0, maxBytes);
  let truncated = false;

  return new Transform({
    transform(chunk: Buffer | string, _enc, cb): void {
      const bytes = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
      if (truncated) {
        cb();
        return;
      }

      const slice = bytes.length > remaining ? bytes.subarray(0, remaining) : bytes;
      if (slice.length > 0) {
        this.push(slice);
      }
      remaining -= slice.length;

      if (bytes.length > slice.length) {
        truncated = true;
        const timestamp = new Date().toISOString();
        const note = structured
          ? `${JSON.stringify({ timestamp, check: checkName, message: '[TRUNCATED]' })}\n`
          : `\n[${timestamp}] [${checkName}] [TRUNCATED at ${maxBytes} bytes]\n`;
        this.push(note);
      }

      cb();
    },
  });
}

/* -------------------------------------------------------------------------- */
/* Public API                                                                  */
/* -------------------------------------------------------------------------- */

/**
 * Write captured output for a single check, replacing any previous log.
 *
 * @param options - Log directory, check name, format and byte budget.
 * @param sections - Text blocks written in order (typically stdout, stderr).
 * @returns Path of the written log file.
 */
export async function writeCheckLog(
  options: LogOptions,
  sections: readonly string[],
): Promise<string> {
  await ensureLogDirectory(options.logDir);

  const logPath = getLogPath(options.logDir, options.checkName);
  const writeStream = createWriteStream(logPath, { flags: 'w' });
  const source = Readable.from(sections.filter((section) => section.length > 0));

  if (options.format === 'raw') {
    await pipeline(
      source,
      createBoundedTransform(options.checkName, false, options.maxBytes),
      writeStream,
    );
  } else {
    const structured = options.format === 'json';
    const format = structured
      ? createStructuredTransform(options.checkName)
      : createNormalizingTransform(options.checkName);
    await pipeline(
      source,
      format,
      createBoundedTransform(options.checkName, structured, options.maxBytes),
      writeStream,
    );
  }

  return logPath;
}

/**
 * Append a single message to a check log.
 *
 * Used for deterministic result and skip reporting.
 */
export async function appendToLog(
  logDir: string,
  checkName: string,
  message: string,
  options: { readonly truncate?: boolean } = {},
): Promise<void> {
  await ensureLogDirectory(logDir);

  const logPath = getLogPath(logDir, checkName);
  const writeStream = createWriteStream(logPath, { flags: options.truncate === true ? 'w' : 'a' });

  return new Promise<void>((resolve, reject) => {
    writeStream.write(`${message}\n`, (error) => {
      if (error) {
        writeStream.destroy();
        reject(error);
        return;
      }
      writeStream.end(() => resolve());
    });
  });
}
