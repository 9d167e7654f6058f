/**
 * FileLister Interface
 *
 * Abstracts the directory walking discovery needs, so the engine runs the
 * same against the real filesystem and an in-memory tree.
 *
 * @module file_lister
 */

/**
 * Error codes for FileLister operations.
 */
export type FileListerErrorCode =
  | 'NOT_FOUND'
  | 'READ_ERROR'
  | 'INVALID_PATH';

/**
 * Error thrown when file operations fail.
 */
export class FileListerError extends Error {
  constructor(
    message: string,
    public readonly code: FileListerErrorCode,
    public readonly filePath?: string
  ) {
    super(message);
    this.name = 'FileListerError';
  }
}

/**
 * Options for file listing.
 */
export interface FileListOptions {
  /** Glob patterns to ignore (e.g., ['node_modules/**']) */
  ignore?: string[];
  /** Return absolute paths instead of relative. Default: false */
  absolute?: boolean;
}

/**
 * Options for FsFileLister.
 */
export interface FsFileListerOptions {
  /** Base directory for all operations */
  cwd: string;
}

/**
 * Options for MemoryFileLister.
 */
export interface MemoryFileListerOptions {
  /** Base directory the file paths are relative to */
  cwd: string;
  /** File paths relative to cwd, "/" separated */
  files: string[];
}

/**
 * Interface for listing files and probing directories.
 *
 * @example
 * ```typescript
 * const lister = new FsFileLister({ cwd: '/path/to/project' });
 * const files = await lister.list(['**\/*.test.js'], { ignore: ['node_modules/**'] });
 * ```
 */
export interface FileLister {
  /**
   * Lists files matching glob patterns, relative to cwd unless `absolute` is set.
   * Results are sorted.
   */
  list(patterns: string[], options?: FileListOptions): Promise<string[]>;

  /**
   * True when the relative path names an existing directory.
   */
  isDirectory(dirPath: string): Promise<boolean>;

  /**
   * Canonical absolute path of a relative path, used to tell apart
   * directories that only differ in case on case-insensitive filesystems.
   * @throws FileListerError NOT_FOUND when the path does not exist
   */
  realPath(relativePath: string): Promise<string>;
}
