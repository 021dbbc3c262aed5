import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { UNBOUNDED_DEPTH, defaultSearchConfig } from '../config.js';
import { collectingSink } from '../core/sink.js';
import { walk } from '../core/walker.js';
import {
  searchTreeInputShape,
  searchTreeOutputShape,
  type SearchTreeInput,
  type SearchTreeOutput,
} from '../schemas.js';
import type { SearchConfig, SubdirectoryErrorPolicy } from '../types.js';
import { silentLogger, type Logger } from '../util/log.js';
import type { IoError } from '../errors.js';

export interface McpServerOptions {
  onSubdirectoryError: SubdirectoryErrorPolicy;
  logger?: Logger;
}

export type SearchTreeResult = { ok: true; output: SearchTreeOutput } | { ok: false; error: IoError };

export function toSearchConfig(input: SearchTreeInput): SearchConfig {
  return Object.freeze({
    ...defaultSearchConfig(),
    maxDepth: input.depthLimit === undefined ? UNBOUNDED_DEPTH : input.depthLimit - 1,
    exactMatch: input.exactMatch,
    showHidden: input.showHidden,
    showDirs: input.type !== 'files',
    showFiles: input.type !== 'dirs',
    pattern: input.pattern,
  });
}

export async function runSearchTree(input: SearchTreeInput, options: McpServerOptions): Promise<SearchTreeResult> {
  const sink = collectingSink(input.limit);
  const outcome = await walk(toSearchConfig(input), input.directory, 0, {
    sink,
    onSubdirectoryError: options.onSubdirectoryError,
    logger: options.logger,
  });

  if (!outcome.ok) {
    return { ok: false, error: outcome.error };
  }

  return {
    ok: true,
    output: {
      paths: sink.paths,
      truncated: sink.truncated,
      skipped: outcome.skipped.map((item) => ({ path: item.path, code: item.code })),
    },
  };
}

export function createSearchServer(options: McpServerOptions): McpServer {
  const mcp = new McpServer(
    {
      name: 'treeseek',
      version: '0.1.0',
    },
    {
      capabilities: {
        tools: {},
      },
      instructions: [
        'Use search_tree to list files and directories below a directory whose names contain a pattern.',
        'Matching is plain substring (or exact name with exactMatch); there is no glob or regex support.',
        'depthLimit N lists N levels: 1 means direct children only.',
        'Hidden files (names starting with ".") are excluded unless showHidden is true; hidden directories are always listed.',
      ].join('\n'),
    },
  );

  mcp.registerTool(
    'search_tree',
    {
      description: 'Recursively search a directory tree for entries whose name matches a pattern',
      inputSchema: searchTreeInputShape,
      outputSchema: searchTreeOutputShape,
    },
    async (args) => {
      const result = await runSearchTree(args, options);
      if (!result.ok) {
        return {
          isError: true,
          content: [{ type: 'text', text: `${result.error.code}: ${result.error.message}` }],
        };
      }

      const { output } = result;
      const lines = output.paths.length > 0 ? output.paths.join('\n') : 'No matches.';
      const notes = output.truncated ? `\n(truncated at ${args.limit} paths)` : '';
      return {
        content: [{ type: 'text', text: `${lines}${notes}` }],
        structuredContent: output,
      };
    },
  );

  return mcp;
}

export async function startMcpServer(options: McpServerOptions): Promise<() => Promise<void>> {
  const logger = options.logger ?? silentLogger;
  const mcp = createSearchServer(options);
  const transport = new StdioServerTransport();
  await mcp.connect(transport);

  console.error('MCP server ready (tool: search_tree) on stdio');

  return async () => {
    await mcp.close();
    logger.info('MCP server stopped.');
  };
}
