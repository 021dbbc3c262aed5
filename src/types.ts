import type { IoError } from './errors.js';

export type EntryType = 'directory' | 'file' | 'other';

export type SubdirectoryErrorPolicy = 'skip' | 'abort';

export interface SearchConfig {
  readonly maxDepth: number; // UNBOUNDED_DEPTH or a bound >= 0; depth 0 = direct children of the start directory
  readonly exactMatch: boolean;
  readonly showDirs: boolean;
  readonly showFiles: boolean;
  readonly showHidden: boolean;
  readonly pattern: string;
}

export interface Classification {
  print: boolean;
  recurse: boolean;
}

export type WalkOutcome =
  | { ok: true; printed: number; skipped: IoError[] }
  | { ok: false; error: IoError; printed: number; skipped: IoError[] };
