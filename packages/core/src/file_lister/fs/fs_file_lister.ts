/**
 * FsFileLister - Filesystem-based FileLister implementation
 *
 * Uses fast-glob for pattern matching and fs/promises for probing.
 *
 * @module file_lister/fs/fs_file_lister
 */

import fg from 'fast-glob';
import * as fs from 'fs/promises';
import * as path from 'path';
import type { FileLister, FileListOptions, FsFileListerOptions } from '../file_lister';
import { FileListerError } from '../file_lister';

/**
 * @example
 * ```typescript
 * const lister = new FsFileLister({ cwd: '/path/to/project' });
 * const files = await lister.list(['**\/*.test.js'], { ignore: ['node_modules/**'] });
 * ```
 */
export class FsFileLister implements FileLister {
  private readonly cwd: string;

  constructor(options: FsFileListerOptions) {
    this.cwd = options.cwd;
  }

  async list(patterns: string[], options?: FileListOptions): Promise<string[]> {
    for (const pattern of patterns) {
      this.validatePath(pattern, 'pattern');
    }

    const files = await fg(patterns, {
      cwd: this.cwd,
      ignore: options?.ignore ?? [],
      onlyFiles: true,
      absolute: options?.absolute ?? false,
      dot: false,
    });
    return files.sort();
  }

  async isDirectory(dirPath: string): Promise<boolean> {
    this.validatePath(dirPath, 'path');

    try {
      const stats = await fs.stat(path.join(this.cwd, dirPath));
      return stats.isDirectory();
    } catch {
      return false;
    }
  }

  async realPath(relativePath: string): Promise<string> {
    this.validatePath(relativePath, 'path');

    const fullPath = path.join(this.cwd, relativePath);
    try {
      return await fs.realpath(fullPath);
    } catch (err: unknown) {
      const error = err as NodeJS.ErrnoException;
      if (error.code === 'ENOENT') {
        throw new FileListerError(`Not found: ${relativePath}`, 'NOT_FOUND', relativePath);
      }
      throw new FileListerError(`Read error: ${error.message}`, 'READ_ERROR', relativePath);
    }
  }

  /**
   * Rejects traversal and absolute paths so every lookup stays under cwd.
   */
  private validatePath(value: string, kind: 'pattern' | 'path'): void {
    if (value.split(/[\\/]/).includes('..')) {
      throw new FileListerError(
        `Invalid ${kind}: path traversal not allowed: ${value}`,
        'INVALID_PATH',
        value
      );
    }
    if (path.isAbsolute(value)) {
      throw new FileListerError(
        `Invalid ${kind}: absolute paths not allowed: ${value}`,
        'INVALID_PATH',
        value
      );
    }
  }
}
