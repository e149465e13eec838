import { readFileSync, statSync } from 'node:fs';

export type ReadResult = { ok: true; text: string } | { ok: false; error: string };

/**
 * File access used by `.include` and by the pipeline to load the entry file.
 *
 * Paths passed in are already resolved; the host does no searching of its own.
 */
export interface SourceHost {
  fileExists(path: string): boolean;
  readFile(path: string): ReadResult;
  /** Directory relative include paths fall back to after the including file's own. */
  cwd(): string;
}

/**
 * {@link SourceHost} backed by the local filesystem.
 */
export const nodeSourceHost: SourceHost = {
  fileExists(path: string): boolean {
    try {
      return statSync(path).isFile();
    } catch {
      return false;
    }
  },
  readFile(path: string): ReadResult {
    try {
      return { ok: true, text: readFileSync(path, 'utf8') };
    } catch (err) {
      return { ok: false, error: err instanceof Error ? err.message : String(err) };
    }
  },
  cwd(): string {
    return process.cwd();
  },
};
