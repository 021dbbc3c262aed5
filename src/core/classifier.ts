import type { Classification, EntryType, SearchConfig } from '../types.js';

const SKIP: Classification = { print: false, recurse: false };
const DOT = 0x2e;

// Both Dirent and Stats fit this shape.
export interface EntryKind {
  isDirectory(): boolean;
  isFile(): boolean;
}

// Names arrive as raw bytes from the walker; strings are accepted for callers that have them.
export type EntryName = string | Buffer;

export function entryTypeOf(entry: EntryKind): EntryType {
  // Symlinks report neither, so they land in 'other' and are never followed.
  if (entry.isDirectory()) return 'directory';
  if (entry.isFile()) return 'file';
  return 'other';
}

function contains(name: EntryName, pattern: string): boolean {
  return typeof name === 'string' ? name.includes(pattern) : name.includes(Buffer.from(pattern));
}

function equals(name: EntryName, pattern: string): boolean {
  return typeof name === 'string' ? name === pattern : name.equals(Buffer.from(pattern));
}

function isHidden(name: EntryName): boolean {
  return typeof name === 'string' ? name.startsWith('.') : name[0] === DOT;
}

/**
 * Decides whether a single directory entry is printed and whether the walker
 * should descend into it. The depth bound is the walker's concern.
 *
 * Directories match by substring only and are exempt from hidden-file
 * suppression; regular files honour every filter. Byte names are compared
 * against the UTF-8 encoding of the pattern.
 */
export function classify(config: SearchConfig, entryName: EntryName, entryType: EntryType): Classification {
  switch (entryType) {
    case 'directory':
      return {
        print: config.showDirs && contains(entryName, config.pattern),
        recurse: true,
      };
    case 'file': {
      if (!config.showFiles) return SKIP;
      if (!config.showHidden && isHidden(entryName)) return SKIP;
      const matched = config.exactMatch ? equals(entryName, config.pattern) : contains(entryName, config.pattern);
      return { print: matched, recurse: false };
    }
    default:
      return SKIP;
  }
}
