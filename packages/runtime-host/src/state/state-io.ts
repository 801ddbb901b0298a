/**
 * Tollgate Runtime Host — StateIO
 *
 * Injectable I/O for JSON state files and JSONL logs, rooted at one
 * Tollgate home directory:
 *
 *   readJson / writeJson   <home>/state/<filename>
 *   appendLine / readLogRaw <home>/logs/<filename>
 *
 * FileStateIO is the durable implementation; MemoryStateIO keeps everything
 * in maps for tests and embedded use. Callers pass bare filenames and never
 * build absolute paths themselves.
 */

import { appendFileSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

export interface StateIO {
  /**
   * Read and parse a JSON state file.
   *
   * @param guard - Shape check for the parsed value; a failing value yields `fallback`
   * @returns `fallback` if the file is absent, unparsable or fails `guard`
   */
  readJson<T>(filename: string, fallback: T, guard: (value: unknown) => value is T): T;

  /** Serialize `value` to `<home>/state/<filename>`, creating the directory on demand. */
  writeJson(filename: string, value: unknown): void;

  /** Append `line` plus '\n' to `<home>/logs/<logfilename>`. */
  appendLine(logfilename: string, line: string): void;

  /** Raw content of a log file, or '' if it does not exist. */
  readLogRaw(logfilename: string): string;
}

/**
 * Synchronous file-system StateIO. ENOENT and malformed JSON are
 * recoverable; other I/O errors propagate.
 */
export class FileStateIO implements StateIO {
  constructor(private readonly homeDir: string) {}

  readJson<T>(filename: string, fallback: T, guard: (value: unknown) => value is T): T {
    const filePath = join(this.homeDir, 'state', filename);
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
    } catch (err: unknown) {
      if (err instanceof SyntaxError || isNodeError(err, 'ENOENT')) {
        return fallback;
      }
      throw err;
    }
    return guard(parsed) ? parsed : fallback;
  }

  writeJson(filename: string, value: unknown): void {
    const dir = join(this.homeDir, 'state');
    mkdirSync(dir, { recursive: true });
    writeFileSync(join(dir, filename), JSON.stringify(value, null, 2), 'utf-8');
  }

  appendLine(logfilename: string, line: string): void {
    const dir = join(this.homeDir, 'logs');
    mkdirSync(dir, { recursive: true });
    appendFileSync(join(dir, logfilename), line + '\n', 'utf-8');
  }

  readLogRaw(logfilename: string): string {
    try {
      return readFileSync(join(this.homeDir, 'logs', logfilename), 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) {
        return '';
      }
      throw err;
    }
  }
}

/**
 * In-memory StateIO. Instances are isolated from each other. Values are
 * round-tripped through JSON on write so serialization behaves as it would
 * on disk.
 */
export class MemoryStateIO implements StateIO {
  private readonly store: Map<string, string> = new Map();
  private readonly logs: Map<string, string[]> = new Map();

  readJson<T>(filename: string, fallback: T, guard: (value: unknown) => value is T): T {
    const raw = this.store.get(filename);
    if (raw === undefined) return fallback;
    const parsed: unknown = JSON.parse(raw);
    return guard(parsed) ? parsed : fallback;
  }

  writeJson(filename: string, value: unknown): void {
    this.store.set(filename, JSON.stringify(value));
  }

  appendLine(logfilename: string, line: string): void {
    const lines = this.logs.get(logfilename) ?? [];
    lines.push(line);
    this.logs.set(logfilename, lines);
  }

  /** Lines appended to a log, in order. Not part of StateIO; for tests. */
  readLines(logfilename: string): ReadonlyArray<string> {
    return this.logs.get(logfilename) ?? [];
  }

  readLogRaw(logfilename: string): string {
    const lines = this.logs.get(logfilename) ?? [];
    return lines.length === 0 ? '' : lines.join('\n') + '\n';
  }
}

function isNodeError(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}
