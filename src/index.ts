#!/usr/bin/env node
import path from 'node:path';
import { describeConfig, parseCliArgs, usage, type CliCommand } from './cli/args.js';
import { loadConfig, loadDotEnv, type RuntimeConfig } from './config.js';
import { streamSink } from './core/sink.js';
import { walk } from './core/walker.js';
import { ConfigError, isErrnoException } from './errors.js';
import { startMcpServer } from './mcp/server.js';
import type { SubdirectoryErrorPolicy } from './types.js';
import { createLogger } from './util/log.js';

async function serve(onSubdirectoryError: SubdirectoryErrorPolicy, logEnabled: boolean): Promise<void> {
  const logger = createLogger({ enabled: logEnabled });
  const stop = await startMcpServer({ onSubdirectoryError, logger });

  const handleSignal = async (signal: string) => {
    console.error(`Received ${signal}, shutting down...`);
    await stop();
    process.exit(0);
  };

  process.on('SIGINT', handleSignal);
  process.on('SIGTERM', handleSignal);
}

// A reader that goes away early (`treeseek / | head -1`) ends the search quietly.
function exitQuietlyOnClosedPipe(): void {
  process.stdout.on('error', (error) => {
    if (isErrnoException(error) && error.code === 'EPIPE') {
      process.exit(0);
    }
    console.error(error);
    process.exit(1);
  });
}

function readSetup(argv: string[], progName: string): { runtime: RuntimeConfig; command: CliCommand } | null {
  try {
    return { runtime: loadConfig(), command: parseCliArgs(argv) };
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      console.error(usage(progName));
      return null;
    }
    throw error;
  }
}

async function bootstrap(argv: string[] = process.argv.slice(2)): Promise<number> {
  const progName = path.basename(process.argv[1] || 'treeseek');

  loadDotEnv();

  const setup = readSetup(argv, progName);
  if (!setup) return 1;
  const { runtime, command } = setup;

  if (command.kind === 'help') {
    console.log(usage(progName));
    return 1;
  }

  if (command.kind === 'mcp') {
    await serve(runtime.onSubdirectoryError, runtime.logEnabled);
    return 0;
  }

  exitQuietlyOnClosedPipe();
  const logger = createLogger({ enabled: runtime.logEnabled });
  describeConfig(command.directory, command.config).forEach((line) => logger.info(line));

  const outcome = await walk(command.config, command.directory, 0, {
    sink: streamSink(process.stdout),
    onSubdirectoryError: runtime.onSubdirectoryError,
    logger,
  });

  if (!outcome.ok) {
    logger.error(outcome.error.message);
    return 1;
  }

  logger.debug(`printed ${outcome.printed} path(s), skipped ${outcome.skipped.length} director(ies)`);
  return 0;
}

bootstrap()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error(error);
    process.exitCode = 1;
  });
