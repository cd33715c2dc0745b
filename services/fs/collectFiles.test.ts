import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { collectFiles } from './collectFiles';
import { NodeFileSystem } from './NodeFileSystem';

describe('collectFiles', () => {
  const fileSystem = new NodeFileSystem();
  let root = '';

  beforeAll(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'rpyfmt-collect-'));
    const write = async (relative: string, content = '') => {
      const target = path.join(root, relative);
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, content, 'utf-8');
    };
    await write('game/script.rpy', '$ a=1\n');
    await write('game/screens.rpy');
    await write('game/tl/french/script.rpy');
    await write('game/options.rpyc');
    await write('game/node_modules/pkg/x.rpy');
    await write('notes.txt');
  });

  afterAll(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('expands directories to the scripts below them, sorted', async () => {
    const files = await collectFiles(['game'], fileSystem, { cwd: root });

    expect(files).toEqual([
      path.join(root, 'game/screens.rpy'),
      path.join(root, 'game/script.rpy'),
      path.join(root, 'game/tl/french/script.rpy')
    ]);
  });

  it('honours exclude globs', async () => {
    const files = await collectFiles(['game'], fileSystem, { cwd: root, exclude: ['**/tl/**'] });

    expect(files).toEqual([
      path.join(root, 'game/screens.rpy'),
      path.join(root, 'game/script.rpy')
    ]);
  });

  it('keeps explicit files and drops duplicates', async () => {
    const files = await collectFiles(['notes.txt', 'game/script.rpy', 'game'], fileSystem, {
      cwd: root,
      exclude: ['**/tl/**']
    });

    expect(files).toEqual([
      path.join(root, 'notes.txt'),
      path.join(root, 'game/script.rpy'),
      path.join(root, 'game/screens.rpy')
    ]);
  });

  it('reads and writes through the node file system', async () => {
    const target = path.join(root, 'game/script.rpy');

    expect(await fileSystem.exists(target)).toBe(true);
    expect(await fileSystem.isDirectory(path.join(root, 'game'))).toBe(true);
    expect(await fileSystem.readFile(target)).toBe('$ a=1\n');

    await fileSystem.writeFile(target, '$ a = 1\n');
    expect(await fileSystem.readFile(target)).toBe('$ a = 1\n');
    expect(await fileSystem.exists(path.join(root, 'missing.rpy'))).toBe(false);
  });
});
