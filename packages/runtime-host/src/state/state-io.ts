/**
 * hpikit Runtime Host: StateIO
 *
 * Project-scoped persistence for the little state a build keeps between
 * runs: JSON documents under `<stateDir>/state/` and append-only JSONL logs
 * under `<stateDir>/logs/`.
 *
 *   FileStateIO  : durable, under a project's `.hpikit/` directory
 *   MemoryStateIO: in-memory, for tests and embedded use
 *
 * Documents come back as `unknown`; the caller owns the schema and checks it.
 */

import { appendFileSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

export interface StateIO {
  /**
   * Parsed content of `state/<filename>`, or undefined when the file is
   * absent or is not valid JSON.
   */
  readJson(filename: string): unknown;

  /** Replace `state/<filename>` with the JSON form of `value`. */
  writeJson(filename: string, value: unknown): void;

  /** Append `line` plus a newline to `logs/<logfilename>`. */
  appendLine(logfilename: string, line: string): void;
}

export class FileStateIO implements StateIO {
  constructor(private readonly stateDir: string) {}

  readJson(filename: string): unknown {
    try {
      return JSON.parse(readFileSync(join(this.stateDir, 'state', filename), 'utf-8'));
    } catch (err: unknown) {
      if (err instanceof SyntaxError || isNodeError(err, 'ENOENT')) return undefined;
      throw err;
    }
  }

  /** Writes through a sibling temp file, so readers never see half a document. */
  writeJson(filename: string, value: unknown): void {
    const dir = join(this.stateDir, 'state');
    mkdirSync(dir, { recursive: true });
    const target = join(dir, filename);
    const temp = `${target}.${process.pid}.tmp`;
    writeFileSync(temp, JSON.stringify(value, null, 2) + '\n', 'utf-8');
    renameSync(temp, target);
  }

  appendLine(logfilename: string, line: string): void {
    const dir = join(this.stateDir, 'logs');
    mkdirSync(dir, { recursive: true });
    appendFileSync(join(dir, logfilename), line + '\n', 'utf-8');
  }
}

/**
 * Documents round-trip through JSON text, matching what FileStateIO would
 * hand back after a write.
 */
export class MemoryStateIO implements StateIO {
  private readonly documents: Map<string, string> = new Map();
  private readonly logs: Map<string, string[]> = new Map();

  readJson(filename: string): unknown {
    const text = this.documents.get(filename);
    return text === undefined ? undefined : JSON.parse(text);
  }

  writeJson(filename: string, value: unknown): void {
    this.documents.set(filename, JSON.stringify(value));
  }

  appendLine(logfilename: string, line: string): void {
    const lines = this.logs.get(logfilename) ?? [];
    lines.push(line);
    this.logs.set(logfilename, lines);
  }

  /** Lines appended so far. Not part of StateIO; for tests. */
  readLines(logfilename: string): ReadonlyArray<string> {
    return this.logs.get(logfilename) ?? [];
  }
}

/** True when `err` is a Node.js errno exception carrying `code`. */
export function isNodeError(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}
