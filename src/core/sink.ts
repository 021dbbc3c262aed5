import type { Writable } from 'node:stream';

const NEWLINE = Buffer.from('\n');

// Paths arrive as the raw bytes the filesystem returned.
export interface OutputSink {
  write(path: Buffer): void;
}

export function streamSink(stream: Pick<Writable, 'write'> = process.stdout): OutputSink {
  return {
    write: (path) => {
      stream.write(Buffer.concat([path, NEWLINE]));
    },
  };
}

export interface CollectingSink extends OutputSink {
  readonly paths: string[];
  readonly rawPaths: Buffer[];
  readonly truncated: boolean;
}

// Keeps at most `limit` paths; later writes only flip `truncated`.
export function collectingSink(limit = Number.POSITIVE_INFINITY): CollectingSink {
  const paths: string[] = [];
  const rawPaths: Buffer[] = [];
  let truncated = false;

  return {
    paths,
    rawPaths,
    get truncated() {
      return truncated;
    },
    write: (path) => {
      if (rawPaths.length < limit) {
        rawPaths.push(path);
        paths.push(path.toString('utf8'));
      } else {
        truncated = true;
      }
    },
  };
}
