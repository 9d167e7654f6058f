/**
 * MemoryFileLister - in-memory FileLister for tests
 *
 * Directories are implied by the file paths it holds.
 *
 * @module file_lister/memory
 */

import * as path from 'path';
import picomatch from 'picomatch';
import type { FileLister, FileListOptions, MemoryFileListerOptions } from '../file_lister';
import { FileListerError } from '../file_lister';

export class MemoryFileLister implements FileLister {
  private readonly cwd: string;
  private readonly files: string[];

  constructor(options: MemoryFileListerOptions) {
    this.cwd = options.cwd;
    this.files = [...options.files].sort();
  }

  async list(patterns: string[], options?: FileListOptions): Promise<string[]> {
    const isMatch = picomatch(patterns);
    const isIgnored = picomatch(options?.ignore ?? []);

    return this.files
      .filter(file => isMatch(file) && !isIgnored(file))
      .map(file => (options?.absolute ? path.posix.join(this.cwd, file) : file));
  }

  async isDirectory(dirPath: string): Promise<boolean> {
    const prefix = this.normalize(dirPath);
    if (prefix === '') {
      return this.files.length > 0;
    }
    return this.files.some(file => file.startsWith(`${prefix}/`));
  }

  async realPath(relativePath: string): Promise<string> {
    const normalized = this.normalize(relativePath);
    const exists = normalized === '' ||
      this.files.includes(normalized) ||
      await this.isDirectory(normalized);
    if (!exists) {
      throw new FileListerError(`Not found: ${relativePath}`, 'NOT_FOUND', relativePath);
    }
    return path.posix.join(this.cwd, normalized);
  }

  private normalize(value: string): string {
    const normalized = path.posix.normalize(value).replace(/^\.(\/|$)/, '').replace(/\/$/, '');
    return normalized === '.' ? '' : normalized;
  }
}
