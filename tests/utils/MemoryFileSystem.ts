import * as path from 'path';
import type { IFileSystemService } from '@services/fs/IFileSystemService';

/**
 * In-memory file system for testing
 * Implements the IFileSystemService interface needed by the formatter
 */
export class MemoryFileSystem implements IFileSystemService {
  private files = new Map<string, string>();
  readonly writes: string[] = [];

  constructor(initial: Record<string, string> = {}) {
    for (const [filePath, content] of Object.entries(initial)) {
      this.files.set(this.normalizePath(filePath), content);
    }
  }

  async readFile(filePath: string): Promise<string> {
    const content = this.files.get(this.normalizePath(filePath));
    if (content === undefined) {
      throw Object.assign(new Error(`ENOENT: no such file or directory, open '${filePath}'`), {
        code: 'ENOENT',
        path: filePath
      });
    }
    return content;
  }

  async writeFile(filePath: string, content: string): Promise<void> {
    const normalizedPath = this.normalizePath(filePath);
    this.files.set(normalizedPath, content);
    this.writes.push(normalizedPath);
  }

  async exists(filePath: string): Promise<boolean> {
    const normalizedPath = this.normalizePath(filePath);
    return this.files.has(normalizedPath) || await this.isDirectory(normalizedPath);
  }

  async isDirectory(filePath: string): Promise<boolean> {
    const prefix = this.normalizePath(filePath).replace(/\/$/, '') + '/';
    for (const key of this.files.keys()) {
      if (key.startsWith(prefix)) return true;
    }
    return false;
  }

  /** Synchronous read for assertions */
  get(filePath: string): string | undefined {
    return this.files.get(this.normalizePath(filePath));
  }

  private normalizePath(filePath: string): string {
    return path.posix.resolve('/', filePath);
  }
}
