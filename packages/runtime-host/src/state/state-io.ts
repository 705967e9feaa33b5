/**
 * mediagate Runtime Host: StateIO Interface
 *
 * A home-scoped, injectable I/O abstraction for reading JSON files and
 * appending to JSONL log files.
 *
 * Two implementations are provided:
 *   - FileStateIO    durable file I/O under a home directory
 *   - MemoryStateIO  in-memory I/O for tests and embedded (non-persistent) use
 */

import { appendFileSync, mkdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/** A state file exists but does not contain valid JSON. */
export class StateFileError extends Error {
  constructor(
    readonly filename: string,
    cause: unknown,
  ) {
    super(`Malformed JSON in ${filename}: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = 'StateFileError';
  }
}

// ---------------------------------------------------------------------------
// StateIO Interface
// ---------------------------------------------------------------------------

/**
 * A home-scoped I/O abstraction.
 *
 * All paths are relative filenames; the implementation resolves them
 * against its root. Callers never construct absolute paths directly.
 *
 * Invariants:
 * - readJson addresses the root of the home directory
 * - appendLine and readLogRaw address the `logs/` subdirectory
 */
export interface StateIO {
  /**
   * Read and parse a JSON file.
   *
   * @returns The parsed value, or undefined if the file does not exist
   * @throws {StateFileError} If the file exists but is not valid JSON
   */
  readJson(filename: string): unknown;

  /**
   * Append a line to a log file. A newline is appended after the content.
   * Creates the logs subdirectory if it does not exist.
   */
  appendLine(logfilename: string, line: string): void;

  /**
   * Return the raw text content of a log file, or an empty string if the
   * file does not exist.
   */
  readLogRaw(logfilename: string): string;
}

// ---------------------------------------------------------------------------
// FileStateIO
// ---------------------------------------------------------------------------

/**
 * Durable file-system StateIO rooted at a home directory.
 *
 * Reads JSON from       `<home>/<filename>`.
 * Appends log lines to  `<home>/logs/<logfilename>`.
 *
 * Synchronous I/O: an appended line is on disk before the call returns.
 * ENOENT is recoverable; other I/O errors are rethrown.
 */
export class FileStateIO implements StateIO {
  constructor(private readonly homeDir: string) {}

  readJson(filename: string): unknown {
    const filePath = join(this.homeDir, filename);
    let raw: string;
    try {
      raw = readFileSync(filePath, 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) {
        return undefined;
      }
      throw err;
    }
    try {
      return JSON.parse(raw);
    } catch (err: unknown) {
      throw new StateFileError(filePath, err);
    }
  }

  appendLine(logfilename: string, line: string): void {
    const logsDir = join(this.homeDir, 'logs');
    mkdirSync(logsDir, { recursive: true });
    appendFileSync(join(logsDir, logfilename), line + '\n', 'utf-8');
  }

  readLogRaw(logfilename: string): string {
    const logPath = join(this.homeDir, 'logs', logfilename);
    try {
      return readFileSync(logPath, 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) {
        return '';
      }
      throw err;
    }
  }
}

// ---------------------------------------------------------------------------
// MemoryStateIO
// ---------------------------------------------------------------------------

/**
 * In-memory StateIO implementation.
 *
 * Files are seeded as raw text so that readJson parses exactly as
 * FileStateIO would, malformed content included.
 */
export class MemoryStateIO implements StateIO {
  private readonly files: Map<string, string> = new Map();
  private readonly logs: Map<string, string[]> = new Map();

  /** Seed a file's raw content. Test helper; not part of StateIO. */
  setFile(filename: string, content: string): void {
    this.files.set(filename, content);
  }

  readJson(filename: string): unknown {
    const raw = this.files.get(filename);
    if (raw === undefined) return undefined;
    try {
      return JSON.parse(raw);
    } catch (err: unknown) {
      throw new StateFileError(filename, err);
    }
  }

  appendLine(logfilename: string, line: string): void {
    const lines = this.logs.get(logfilename) ?? [];
    lines.push(line);
    this.logs.set(logfilename, lines);
  }

  /** All lines appended to a log file. Not part of StateIO. */
  readLines(logfilename: string): ReadonlyArray<string> {
    return this.logs.get(logfilename) ?? [];
  }

  readLogRaw(logfilename: string): string {
    const lines = this.logs.get(logfilename) ?? [];
    if (lines.length === 0) return '';
    // Match FileStateIO: each appendLine call adds 'line\n'
    return lines.join('\n') + '\n';
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** Narrow an unknown error to a Node.js errno exception with a specific code. */
export function isNodeError(err: unknown, code: string): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err && err.code === code;
}
