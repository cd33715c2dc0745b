import * as path from 'path';
import { glob } from 'tinyglobby';
import type { IFileSystemService } from './IFileSystemService';

export const SCRIPT_PATTERN = '**/*.rpy';

export const DEFAULT_GLOB_IGNORE = ['**/node_modules/**', '**/.git/**'];

export interface CollectOptions {
  exclude?: string[];
  cwd?: string;
}

/**
 * Expands directories to the Ren'Py scripts below them. Files named
 * explicitly are kept even when they do not end in `.rpy`.
 */
export async function collectFiles(
  inputs: readonly string[],
  fileSystem: IFileSystemService,
  options: CollectOptions = {}
): Promise<string[]> {
  const cwd = options.cwd ?? process.cwd();
  const ignore = [...DEFAULT_GLOB_IGNORE, ...(options.exclude ?? [])];
  const files: string[] = [];
  const seen = new Set<string>();

  const add = (file: string) => {
    if (!seen.has(file)) {
      seen.add(file);
      files.push(file);
    }
  };

  for (const input of inputs) {
    const absolute = path.resolve(cwd, input);
    if (await fileSystem.isDirectory(absolute)) {
      const matches = await glob(SCRIPT_PATTERN, {
        cwd: absolute,
        absolute: true,
        ignore
      });
      matches.sort().forEach(add);
    } else {
      add(absolute);
    }
  }

  return files;
}
