import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

// A string is a file's contents, a nested object is a directory.
export interface TreeSpec {
  [name: string]: string | TreeSpec;
}

export async function buildTree(root: string, spec: TreeSpec): Promise<void> {
  for (const [name, value] of Object.entries(spec)) {
    const target = path.join(root, name);
    if (typeof value === 'string') {
      await fs.writeFile(target, value);
    } else {
      await fs.mkdir(target);
      await buildTree(target, value);
    }
  }
}

export async function makeTempTree(spec: TreeSpec): Promise<string> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'treeseek-'));
  await buildTree(root, spec);
  return root;
}

export async function removeTree(root: string): Promise<void> {
  await fs.rm(root, { recursive: true, force: true });
}

export function sorted(values: readonly string[]): string[] {
  return [...values].sort();
}
