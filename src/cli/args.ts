import { parseArgs } from 'node:util';
import { defaultSearchConfig } from '../config.js';
import { ConfigError } from '../errors.js';
import { depthLimitSchema } from '../schemas.js';
import type { SearchConfig } from '../types.js';

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'mcp' }
  | { kind: 'search'; directory: string; config: SearchConfig };

export function usage(progName = 'treeseek'): string {
  return [
    `Usage: ${progName} [-defhH] [-l depth-limit] [directory] [search-pattern]`,
    '',
    'Options:',
    '    * -d    Only display directories (no files)',
    '    * -e    Match search-pattern exactly; no partial matches reported.',
    '    * -f    Only display files (no directories)',
    '    * -l    Set a depth limit, e.g., recurse no more than 2 directories deep.',
    '    * -h    Display hidden files.',
    '    * -H    Display help/usage information',
    '    * --mcp Serve the search_tree tool over MCP (stdio) instead of searching.',
    '',
  ].join('\n');
}

function firstSentence(message: string): string {
  const end = message.indexOf('. ');
  return end === -1 ? message : message.slice(0, end + 1);
}

// `-l N` prints N levels of the tree, so the walker bound is N - 1.
export function depthLimitToMaxDepth(raw: string): number {
  const parsed = depthLimitSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`${issue ? issue.message : 'Invalid limit'}: "${raw}"`);
  }
  return parsed.data - 1;
}

function readArgv(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        dirs: { type: 'boolean', short: 'd' },
        files: { type: 'boolean', short: 'f' },
        exact: { type: 'boolean', short: 'e' },
        hidden: { type: 'boolean', short: 'h' },
        help: { type: 'boolean', short: 'H' },
        limit: { type: 'string', short: 'l' },
        mcp: { type: 'boolean' },
      },
    });
  } catch (error) {
    if (error instanceof Error) {
      throw new ConfigError(firstSentence(error.message));
    }
    throw error;
  }
}

export function parseCliArgs(argv: string[]): CliCommand {
  const { values, positionals } = readArgv(argv);

  if (values.help) return { kind: 'help' };
  if (values.mcp) return { kind: 'mcp' };

  const defaults = defaultSearchConfig();
  const config: SearchConfig = Object.freeze({
    ...defaults,
    maxDepth: values.limit === undefined ? defaults.maxDepth : depthLimitToMaxDepth(values.limit),
    exactMatch: values.exact ?? defaults.exactMatch,
    showFiles: values.dirs ? false : defaults.showFiles,
    showDirs: values.files ? false : defaults.showDirs,
    showHidden: values.hidden ?? defaults.showHidden,
    pattern: positionals[1] ?? defaults.pattern,
  });

  return { kind: 'search', directory: positionals[0] ?? '.', config };
}

export function describeConfig(directory: string, config: SearchConfig): string[] {
  const onOff = (value: boolean) => (value ? 'ON' : 'OFF');
  // Report the level count as typed with -l, not the zero-based bound.
  const depthLimit = config.maxDepth < 0 ? -1 : config.maxDepth + 1;
  return [
    `Starting search. Directory: ${directory}; Search pattern: ${config.pattern}`,
    `Depth limit: ${depthLimit}; Exact match ${onOff(config.exactMatch)}; Show files ${onOff(
      config.showFiles,
    )}; Show dirs ${onOff(config.showDirs)}; Show hidden ${onOff(config.showHidden)}`,
  ];
}
