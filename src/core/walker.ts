import fs from 'node:fs/promises';
import { IoError, isErrnoException } from '../errors.js';
import { silentLogger, type Logger } from '../util/log.js';
import type { EntryType, SearchConfig, SubdirectoryErrorPolicy, WalkOutcome } from '../types.js';
import { classify, entryTypeOf } from './classifier.js';
import type { OutputSink } from './sink.js';

const SEPARATOR = Buffer.from('/');
const CURRENT_DIR = Buffer.from('.');
const PARENT_DIR = Buffer.from('..');

export interface WalkOptions {
  sink: OutputSink;
  onSubdirectoryError?: SubdirectoryErrorPolicy;
  logger?: Logger;
}

interface WalkState {
  config: SearchConfig;
  sink: OutputSink;
  policy: SubdirectoryErrorPolicy;
  logger: Logger;
  printed: number;
  skipped: IoError[];
}

export function isWithinDepth(config: SearchConfig, depth: number): boolean {
  return config.maxDepth < 0 || depth < config.maxDepth;
}

// Top-level failures always end the walk; nested ones follow the policy.
function handleFailure(state: WalkState, directoryPath: Buffer, error: unknown, isRoot: boolean): IoError | null {
  const ioError = IoError.from(directoryPath.toString(), error);
  if (isRoot || state.policy === 'abort') {
    return ioError;
  }
  state.logger.warn(`skipping ${ioError.path}: ${ioError.message}`);
  state.skipped.push(ioError);
  return null;
}

// An entry that vanished or cannot be stat'ed after listing is treated as 'other'.
async function entryTypeAt(state: WalkState, entryPath: Buffer): Promise<EntryType> {
  try {
    return entryTypeOf(await fs.lstat(entryPath));
  } catch (error) {
    if (!isErrnoException(error)) throw error;
    state.logger.warn(`cannot stat ${entryPath.toString()}: ${error.message}`);
    return 'other';
  }
}

async function walkDirectory(
  state: WalkState,
  directoryPath: Buffer,
  depth: number,
  isRoot: boolean,
): Promise<IoError | null> {
  // Names stay raw bytes so paths that are not valid UTF-8 survive the round trip.
  let names: Buffer[];
  try {
    names = await fs.readdir(directoryPath, { encoding: 'buffer' });
  } catch (error) {
    if (!isErrnoException(error)) throw error;
    return handleFailure(state, directoryPath, error, isRoot);
  }

  state.logger.debug(`listing ${directoryPath.toString()} (depth ${depth})`);

  for (const name of names) {
    if (name.equals(CURRENT_DIR) || name.equals(PARENT_DIR)) continue;

    const childPath = Buffer.concat([directoryPath, SEPARATOR, name]);
    const decision = classify(state.config, name, await entryTypeAt(state, childPath));

    if (decision.print) {
      state.sink.write(childPath);
      state.printed += 1;
    }

    if (decision.recurse && isWithinDepth(state.config, depth)) {
      const failure = await walkDirectory(state, childPath, depth + 1, false);
      if (failure) return failure;
    }
  }

  return null;
}

/**
 * Depth-first search of `directoryPath`, writing every path the classifier
 * accepts to `options.sink` in enumeration order. Paths are composed by plain
 * concatenation, so each one starts with `directoryPath` exactly as given.
 *
 * Only errno failures from listing a directory become part of the outcome;
 * anything else, such as an exception from the sink, rejects.
 */
export async function walk(
  config: SearchConfig,
  directoryPath: string,
  currentDepth: number,
  options: WalkOptions,
): Promise<WalkOutcome> {
  const state: WalkState = {
    config,
    sink: options.sink,
    policy: options.onSubdirectoryError ?? 'skip',
    logger: options.logger ?? silentLogger,
    printed: 0,
    skipped: [],
  };

  const error = await walkDirectory(state, Buffer.from(directoryPath), currentDepth, true);
  if (error) {
    return { ok: false, error, printed: state.printed, skipped: state.skipped };
  }
  return { ok: true, printed: state.printed, skipped: state.skipped };
}
