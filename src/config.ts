import path from 'node:path';
import fs from 'node:fs';
import { ConfigError } from './errors.js';
import type { SearchConfig, SubdirectoryErrorPolicy } from './types.js';

export const UNBOUNDED_DEPTH = -1;

export interface RuntimeConfig {
  logEnabled: boolean;
  onSubdirectoryError: SubdirectoryErrorPolicy;
}

export function defaultSearchConfig(): SearchConfig {
  return Object.freeze({
    maxDepth: UNBOUNDED_DEPTH,
    exactMatch: false,
    showDirs: true,
    showFiles: true,
    showHidden: false,
    pattern: '',
  });
}

function parseFlag(value: string | undefined): boolean {
  if (!value) return false;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function parsePolicy(value: string | undefined): SubdirectoryErrorPolicy {
  const normalized = (value || 'skip').trim().toLowerCase();
  if (normalized === 'skip' || normalized === 'abort') {
    return normalized;
  }
  throw new ConfigError(`TREESEEK_ON_SUBDIR_ERROR must be "skip" or "abort", got "${value}"`);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  return {
    logEnabled: parseFlag(env.TREESEEK_LOG),
    onSubdirectoryError: parsePolicy(env.TREESEEK_ON_SUBDIR_ERROR),
  };
}

const DOTENV_LINE = /^(?:export\s+)?(TREESEEK_[A-Z_]+)\s*=\s*(.*)$/;

function unquote(value: string): string {
  const quoted = /^(['"])(.*)\1$/.exec(value);
  return quoted ? quoted[2] ?? '' : value.replace(/\s+#.*$/, '');
}

// Fills unset TREESEEK_* variables from ./.env; other keys are ignored.
export function loadDotEnv(cwd: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): void {
  const envPath = path.resolve(cwd, '.env');
  if (!fs.existsSync(envPath)) return;

  for (const line of fs.readFileSync(envPath, 'utf-8').split('\n')) {
    const match = DOTENV_LINE.exec(line.trim());
    if (!match) continue;
    const [, key = '', raw = ''] = match;
    const value = unquote(raw.trim());
    if (value && env[key] === undefined) {
      env[key] = value;
    }
  }
}
